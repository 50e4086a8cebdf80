// ---------------------------------------------------------------------------
// Lending Desk -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";

import type { AppConfig } from "./core/types.js";
import type { AppEnv } from "./api/types.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { JsonFileStateStore } from "./storage/json-file-store.js";
import { LendingEngine } from "./lending/lending-engine.js";
import { LendingDesk } from "./lending/lending-desk.js";
import { createApp } from "./api/server.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
}

/**
 * Wire the service together: config, logger, store, engine, desk, HTTP app.
 * There is no module-level library instance; each call builds its own.
 */
export async function buildApp(config: AppConfig = loadConfig()): Promise<BuiltApp> {
  // 1. Create logger
  const logger = createLogger({
    level: config.logLevel,
    prettyPrint: config.env === "development",
  });

  // 2. Open the store and load the library
  const store = new JsonFileStateStore(config.storage.dataFile, logger.child({ module: "store" }));
  const engine = await LendingEngine.open({
    store,
    policy: config.lending,
    logger: logger.child({ module: "lending" }),
  });

  // 3. Create Hono app over the operation surface
  const app = createApp({
    desk: new LendingDesk(engine),
    logger,
    production: config.env === "production",
  });

  // 4. Log startup summary
  logger.info(
    {
      port: config.port,
      env: config.env,
      dataFile: store.location,
      books: engine.listBooks().length,
      members: engine.listMembers().length,
      loanPeriodDays: config.lending.loanPeriodDays,
      finePerDay: config.lending.finePerDay,
    },
    "lending-desk ready",
  );

  return { app, config };
}
