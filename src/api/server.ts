// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { AppEnv } from "./types.js";
import type { LendingDesk } from "../lending/lending-desk.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { createErrorHandler } from "./middleware/error-handler.js";

import { pageRoutes } from "./routes/page.js";
import { healthRoutes } from "./routes/health.js";
import { bookRoutes } from "./routes/books.js";
import { memberRoutes } from "./routes/members.js";
import { loanRoutes } from "./routes/loans.js";
import { historyRoutes } from "./routes/history.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  desk: LendingDesk;
  logger: pino.Logger;
  /** Production mode: error responses carry no details. */
  production: boolean;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler for anything a route throws.
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.route("/", pageRoutes());
  app.route("/health", healthRoutes());
  app.route("/books", bookRoutes({ desk: deps.desk }));
  app.route("/members", memberRoutes({ desk: deps.desk }));
  app.route("/loans", loanRoutes({ desk: deps.desk }));
  app.route("/history", historyRoutes({ desk: deps.desk }));

  // ── Fallbacks ─────────────────────────────────────────────────────────

  app.notFound((c) => c.json({ success: false, message: "Not found", type: "not_found" }, 404));
  app.onError(createErrorHandler(deps.logger, { hideDetails: deps.production }));

  return app;
}
