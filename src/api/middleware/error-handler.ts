// ---------------------------------------------------------------------------
// Hono error handler: maps anything thrown out of a route to a JSON response.
// Business failures and save failures never get here; the desk reports those
// in its operation reports.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type pino from "pino";

export interface ErrorHandlerOptions {
  /** Replace error messages with a generic one in responses. */
  hideDetails: boolean;
}

/**
 * Build a Hono `onError` handler answering 500 Internal Server Error.
 *
 * With `hideDetails` (production) the message is replaced with a generic one
 * so file paths and stack details stay in the logs.
 */
export function createErrorHandler(
  logger: pino.Logger,
  options: ErrorHandlerOptions,
): (err: Error, c: Context) => Response {
  return (err: Error, c: Context): Response => {
    const requestId: unknown = c.get("requestId");

    logger.error(
      { err: { name: err.name, message: err.message }, requestId, path: c.req.path },
      "unhandled error",
    );

    return c.json(
      {
        success: false,
        message: options.hideDetails ? "Internal server error" : err.message,
        type: "internal_error",
      },
      500,
    );
  };
}
