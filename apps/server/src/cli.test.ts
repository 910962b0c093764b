import { describe, expect, it } from "vitest";
import { configFromArgs, main, parseCliArgs } from "./cli";
import { loadConfig } from "./config";
import { ValidationError } from "./lib/errors";

const env = { DB_FILENAME: ":memory:", LOG_LEVEL: "silent" };

describe("parseCliArgs", () => {
  it("parses short flags", () => {
    expect(parseCliArgs(["-o", "42", "-s", "2024-01-01", "-e", "2024-01-31", "-r", "-d"])).toMatchObject({
      organization: 42,
      start: "2024-01-01",
      stop: "2024-01-31",
      "report-only": true,
      debug: true,
      install: false,
    });
  });

  it("rejects install together with an organization", () => {
    expect(() => parseCliArgs(["-i", "-o", "42"])).toThrow("--install and --organization are mutually exclusive");
  });

  it("rejects malformed dates", () => {
    expect(() => parseCliArgs(["--start", "01/01/2024"])).toThrow("must be a YYYY-MM-DD date");
  });
});

describe("configFromArgs", () => {
  it("lets --organization override the environment when serving", () => {
    const cfg = configFromArgs(parseCliArgs(["--serve", "-o", "42"]), loadConfig({ ...env, HUBSTAFF_ORGANIZATION_ID: "7" }));
    expect(cfg.organizationId).toBe(42);
  });

  it("falls back to the environment's organization id", () => {
    const cfg = configFromArgs(parseCliArgs(["--serve"]), loadConfig({ ...env, HUBSTAFF_ORGANIZATION_ID: "7" }));
    expect(cfg.organizationId).toBe(7);
  });

  it("switches to debug logging with -d", () => {
    const cfg = configFromArgs(parseCliArgs(["-d"]), loadConfig(env));
    expect(cfg).toMatchObject({ debug: true, logLevel: "debug" });
  });
});

describe("main", () => {
  it("installs and exits", async () => {
    const lines: string[] = [];
    await expect(main(["--install"], env, line => lines.push(line))).resolves.toBe(0);
    expect(lines).toEqual([]);
  });

  it("prints an empty report in report-only mode", async () => {
    const lines: string[] = [];
    await expect(main(["--report-only"], env, line => lines.push(line))).resolves.toBe(0);
    expect(lines).toEqual(["No tracked time recorded."]);
  });

  it("fails without an organization id and keeps stdout clean", async () => {
    const lines: string[] = [];
    await expect(main([], env, line => lines.push(line))).rejects.toThrow(ValidationError);
    expect(lines).toEqual([]);
  });
});
