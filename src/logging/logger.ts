// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/**
 * Create the service's root logger. Every line carries `service` and
 * `version`; modules add their own name with `logger.child({ module })`.
 *
 * In development the output goes through the `pino-pretty` transport.
 * Otherwise it is JSON, written to `destination` when one is given.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "lending-desk",
      version: process.env["APP_VERSION"] ?? "dev",
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}
