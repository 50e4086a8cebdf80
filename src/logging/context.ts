// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type pino from "pino";

/**
 * Creates a Hono middleware that attaches a request-scoped child logger
 * to every incoming request context.
 *
 * The child logger carries `requestId`, `method`, and `path`. Mount it after
 * `requestIdMiddleware()` so the id is already on the context.
 *
 * Downstream handlers access the logger via `c.get("logger")`.
 */
export function createRequestLogger(
  baseLogger: pino.Logger,
): (c: Context, next: Next) => Promise<void> {
  return async (c: Context, next: Next): Promise<void> => {
    const requestId: unknown = c.get("requestId");

    const childLogger = baseLogger.child({
      requestId: typeof requestId === "string" ? requestId : randomUUID(),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.debug("request started");

    await next();

    const durationMs = Date.now() - start;
    childLogger.info({ durationMs, status: c.res.status }, "request completed");
  };
}
