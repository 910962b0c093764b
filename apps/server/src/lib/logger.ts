import pino from "pino";
import type { AppConfig } from "../config";

export type RootLogger = pino.Logger;

type Meta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: Meta) => void;
  info: (msg: string, meta?: Meta) => void;
  warn: (msg: string, meta?: Meta) => void;
  error: (msgOrError: unknown, meta?: Meta) => void;
};

/** JSON lines on stderr. Stdout belongs to the report. */
export function createRootLogger(cfg: Pick<AppConfig, "logLevel">): RootLogger {
  return pino(
    {
      level: cfg.logLevel,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export function createLogger(root: RootLogger, name: string): Logger {
  const child = root.child({ name });
  return {
    debug: (msg, meta) => child.debug(meta ?? {}, msg),
    info: (msg, meta) => child.info(meta ?? {}, msg),
    warn: (msg, meta) => child.warn(meta ?? {}, msg),
    error: (msgOrError, meta) => {
      if (typeof msgOrError === "string") {
        child.error(meta ?? {}, msgOrError);
        return;
      }
      const err = msgOrError instanceof Error ? msgOrError : new Error(String(msgOrError));
      child.error({ ...meta, err }, err.message);
    },
  };
}

/** Logger that drops everything; for tests and one-off tooling. */
export function silentLogger(): RootLogger {
  return pino({ level: "silent" });
}
