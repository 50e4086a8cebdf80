// ---------------------------------------------------------------------------
// Tests for loadConfig.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "lending-desk-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeYaml(body: string): Promise<string> {
    const file = path.join(dir, "lending-desk.yaml");
    await fs.writeFile(file, body, "utf-8");
    return file;
  }

  // ── Defaults & environment ──────────────────────────────────────────────

  it("falls back to defaults for everything", () => {
    expect(loadConfig({})).toEqual({
      env: "development",
      port: 3000,
      logLevel: "info",
      storage: { dataFile: "./data/library_data.json" },
      lending: { loanPeriodDays: 7, finePerDay: 10 },
    });
  });

  it("reads environment variables", () => {
    const config = loadConfig({
      LENDING_DESK_ENV: "production",
      PORT: "8080",
      LOG_LEVEL: "warn",
      LENDING_DESK_DATA_FILE: "/var/lib/lending/library.json",
      LENDING_DESK_LOAN_DAYS: "14",
      LENDING_DESK_FINE_PER_DAY: "2.5",
    });

    expect(config).toEqual({
      env: "production",
      port: 8080,
      logLevel: "warn",
      storage: { dataFile: "/var/lib/lending/library.json" },
      lending: { loanPeriodDays: 14, finePerDay: 2.5 },
    });
  });

  it("rejects invalid values with the offending setting named", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Invalid configuration: port: /);
    expect(() => loadConfig({ LENDING_DESK_LOAN_DAYS: "0" })).toThrow(
      /^Invalid configuration: lending\.loanPeriodDays: /,
    );
    expect(() => loadConfig({ LENDING_DESK_FINE_PER_DAY: "-1" })).toThrow(
      /^Invalid configuration: lending\.finePerDay: /,
    );
    expect(() => loadConfig({ LENDING_DESK_ENV: "staging" })).toThrow(
      /^Invalid configuration: env: /,
    );
  });

  // ── YAML file ───────────────────────────────────────────────────────────

  describe("with a config file", () => {
    it("reads settings from the file", async () => {
      const file = await writeYaml(
        ["port: 4000", "storage:", "  dataFile: ./books.json", "lending:", "  finePerDay: 25", ""].join("\n"),
      );

      expect(loadConfig({ LENDING_DESK_CONFIG: file })).toEqual({
        env: "development",
        port: 4000,
        logLevel: "info",
        storage: { dataFile: "./books.json" },
        lending: { loanPeriodDays: 7, finePerDay: 25 },
      });
    });

    it("lets environment variables override the file", async () => {
      const file = await writeYaml(["port: 4000", "lending:", "  finePerDay: 25", ""].join("\n"));

      const config = loadConfig({
        LENDING_DESK_CONFIG: file,
        PORT: "5000",
        LENDING_DESK_FINE_PER_DAY: "5",
      });

      expect(config.port).toBe(5000);
      expect(config.lending).toEqual({ loanPeriodDays: 7, finePerDay: 5 });
    });

    it("treats an empty file as no settings", async () => {
      const file = await writeYaml("");
      expect(loadConfig({ LENDING_DESK_CONFIG: file }).port).toBe(3000);
    });

    it("rejects a file that is not a mapping", async () => {
      const file = await writeYaml("- one\n- two\n");
      expect(() => loadConfig({ LENDING_DESK_CONFIG: file })).toThrow(
        `Config file ${file} must contain a mapping`,
      );
    });

    it("rejects a file that does not exist", () => {
      const file = path.join(dir, "absent.yaml");
      expect(() => loadConfig({ LENDING_DESK_CONFIG: file })).toThrow(
        `Config file ${file} could not be read`,
      );
    });
  });
});
