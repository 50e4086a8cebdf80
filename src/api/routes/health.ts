// ---------------------------------------------------------------------------
// Health check route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../types.js";

const startedAt = Date.now();

/** `GET /health` -- basic liveness probe. */
export function healthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
