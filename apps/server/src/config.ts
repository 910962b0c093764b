import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./lib/errors";

const booleanFlag = z
  .enum(["1", "0", "true", "false", "yes", "no", ""])
  .default("")
  .transform(v => v === "1" || v === "true" || v === "yes");

const envSchema = z.object({
  HUBSTAFF_BASE_URL: z.string().url().default("https://api.hubstaff.com"),
  HUBSTAFF_APP_TOKEN: z.string().default(""),
  HUBSTAFF_EMAIL: z.string().default(""),
  HUBSTAFF_PASSWORD: z.string().default(""),
  HUBSTAFF_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  HUBSTAFF_ORGANIZATION_ID: z.preprocess(v => (v === "" ? undefined : v), z.coerce.number().int().positive().optional()),
  HUBSTAFF_DEBUG: booleanFlag,
  DB_FILENAME: z.string().min(1).default("hubstaff.db"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default("127.0.0.1"),
  CORS_ORIGIN: z.string().default("*"),
  EXPOSE_ERROR_DETAILS: booleanFlag,
  SYNC_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export type AppConfig = Readonly<{
  hubstaffBaseUrl: string;
  hubstaffAppToken: string;
  hubstaffEmail: string;
  hubstaffPassword: string;
  hubstaffTimeoutMs: number;
  organizationId?: number;
  debug: boolean;
  dbPath: string;
  logLevel: LogLevel;
  port: number;
  host: string;
  corsOrigin: string;
  exposeErrorDetails: boolean;
  syncIntervalMs: number;
}>;

/**
 * Builds the application config from environment variables.
 * Pass an explicit env object in tests; `.env` is only read when none is given.
 */
export function loadConfig(env?: Record<string, string | undefined>): AppConfig {
  if (!env) loadDotenv();
  const source = env ?? process.env;

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const keys = parsed.error.issues.map(i => i.path.join("."));
    throw new ConfigError(`Invalid configuration: ${keys.join(", ")}`, parsed.error.flatten().fieldErrors);
  }

  const e = parsed.data;
  return Object.freeze({
    hubstaffBaseUrl: e.HUBSTAFF_BASE_URL.replace(/\/+$/, ""),
    hubstaffAppToken: e.HUBSTAFF_APP_TOKEN,
    hubstaffEmail: e.HUBSTAFF_EMAIL,
    hubstaffPassword: e.HUBSTAFF_PASSWORD,
    hubstaffTimeoutMs: e.HUBSTAFF_TIMEOUT_MS,
    organizationId: e.HUBSTAFF_ORGANIZATION_ID,
    debug: e.HUBSTAFF_DEBUG,
    dbPath: e.DB_FILENAME,
    logLevel: e.HUBSTAFF_DEBUG ? "debug" : e.LOG_LEVEL,
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN,
    exposeErrorDetails: e.EXPOSE_ERROR_DETAILS,
    syncIntervalMs: e.SYNC_INTERVAL_MS,
  });
}
