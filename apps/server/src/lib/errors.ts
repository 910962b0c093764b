export type ErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "DATA_INTEGRITY_ERROR"
  | "NOT_SUPPORTED";

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }

  toJSON() {
    const result: { error: ErrorCode; message: string; details?: unknown } = {
      error: this.code,
      message: this.message,
    };
    if (this.details !== undefined) result.details = this.details;
    return result;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super("CONFIG_ERROR", message, 500, details);
    this.name = "ConfigError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super("VALIDATION_ERROR", message, 400, details);
    this.name = "ValidationError";
  }
}

/** A stored row that cannot be turned back into an entity. Not recoverable. */
export class DataIntegrityError extends AppError {
  constructor(table: string, column: string, value: unknown) {
    super("DATA_INTEGRITY_ERROR", `Corrupt value in ${table}.${column}: ${JSON.stringify(value)}`, 500, {
      table,
      column,
      value,
    });
    this.name = "DataIntegrityError";
  }
}

export class NotSupportedError extends AppError {
  constructor(capability: string) {
    super("NOT_SUPPORTED", `${capability} is not supported`, 501);
    this.name = "NotSupportedError";
  }
}
