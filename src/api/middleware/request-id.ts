// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";

/** UUIDs or short alphanumeric ids only; anything else could inject into logs. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that gives every request an id.
 *
 * A well-formed incoming `X-Request-ID` is reused; otherwise a fresh
 * `randomUUID()` is generated. The id is stored on the context as
 * `"requestId"` and echoed in the `X-Request-ID` response header.
 */
export function requestIdMiddleware(): (
  c: Context,
  next: Next,
) => Promise<void> {
  return async (c: Context, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing)
        ? existing
        : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
