// ---------------------------------------------------------------------------
// Transaction history route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../types.js";
import type { LendingDesk } from "../../lending/lending-desk.js";
import { respond } from "./respond.js";

export interface HistoryRouteDeps {
  desk: LendingDesk;
}

/** `GET /history` -- every borrow and return, newest first. */
export function historyRoutes(deps: HistoryRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.get("/", (c) => respond(c, deps.desk.listHistory()));
  return app;
}
