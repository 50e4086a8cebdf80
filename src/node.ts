// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint.
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const { app, config } = await buildApp();

serve({
  fetch: app.fetch,
  port: config.port,
});
