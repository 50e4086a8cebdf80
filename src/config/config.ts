// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads an optional YAML file, then environment variables, with defaults for
// everything so the service starts with zero configuration.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

const NumberLike = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

export const AppConfigSchema = z.object({
  env: z.enum(["development", "test", "production"]).default("development"),
  port: NumberLike.pipe(z.number().int().min(0).max(65_535)).default(3000),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  storage: z
    .object({
      dataFile: z.string().min(1).default("./data/library_data.json"),
    })
    .default({}),
  lending: z
    .object({
      loanPeriodDays: NumberLike.pipe(z.number().int().positive()).default(7),
      finePerDay: NumberLike.pipe(z.number().nonnegative()).default(10),
    })
    .default({}),
});

// ── Sources ─────────────────────────────────────────────────────────────────

function readConfigFile(filePath: string): Record<string, unknown> {
  const absolute = path.resolve(filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Config file ${absolute} could not be read`, { cause: err });
  }

  const parsed: unknown = parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${absolute} must contain a mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function section(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/** Drop keys whose value is `undefined` so they do not mask file settings. */
function defined(values: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(values)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Load the application configuration.
 *
 * Precedence: environment variables, then the YAML file named by
 * `LENDING_DESK_CONFIG`, then defaults.
 *
 * @throws {ConfigurationError} when a value is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file: Record<string, unknown> = env["LENDING_DESK_CONFIG"]
    ? readConfigFile(env["LENDING_DESK_CONFIG"])
    : {};

  const input: Record<string, unknown> = {
    ...file,
    ...defined({
      env: env["LENDING_DESK_ENV"],
      port: env["PORT"],
      logLevel: env["LOG_LEVEL"],
    }),
    storage: {
      ...section(file["storage"]),
      ...defined({ dataFile: env["LENDING_DESK_DATA_FILE"] }),
    },
    lending: {
      ...section(file["lending"]),
      ...defined({
        loanPeriodDays: env["LENDING_DESK_LOAN_DAYS"],
        finePerDay: env["LENDING_DESK_FINE_PER_DAY"],
      }),
    },
  };

  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
