import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./lib/errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      hubstaffBaseUrl: "https://api.hubstaff.com",
      dbPath: "hubstaff.db",
      logLevel: "info",
      debug: false,
      port: 3001,
      syncIntervalMs: 0,
    });
    expect(cfg.organizationId).toBeUndefined();
  });

  it("reads and coerces values", () => {
    const cfg = loadConfig({
      HUBSTAFF_BASE_URL: "https://hubstaff.test/",
      HUBSTAFF_ORGANIZATION_ID: "42",
      HUBSTAFF_TIMEOUT_MS: "5000",
      DB_FILENAME: "/tmp/timepivot.db",
    });
    expect(cfg.hubstaffBaseUrl).toBe("https://hubstaff.test");
    expect(cfg.organizationId).toBe(42);
    expect(cfg.hubstaffTimeoutMs).toBe(5000);
    expect(cfg.dbPath).toBe("/tmp/timepivot.db");
  });

  it("treats a blank organization id as unset", () => {
    expect(loadConfig({ HUBSTAFF_ORGANIZATION_ID: "" }).organizationId).toBeUndefined();
  });

  it("switches to debug logging with HUBSTAFF_DEBUG", () => {
    const cfg = loadConfig({ HUBSTAFF_DEBUG: "1", LOG_LEVEL: "warn" });
    expect(cfg.debug).toBe(true);
    expect(cfg.logLevel).toBe("debug");
  });

  it("names the invalid keys", () => {
    expect(() => loadConfig({ PORT: "abc", HUBSTAFF_BASE_URL: "not a url" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "abc" })).toThrow("Invalid configuration: PORT");
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
