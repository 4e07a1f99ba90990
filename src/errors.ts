export type ErrorContext = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

export class HttpStatusError extends AppError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    code = "HTTP_ERROR"
  ) {
    super(`HTTP ${status}`, code, { status, body });
    this.name = "HttpStatusError";
  }
}

export class UnauthorizedError extends HttpStatusError {
  constructor(body: string) {
    super(401, body, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class RetriesExhaustedError extends AppError {
  constructor(
    operation: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      `${operation} failed after ${attempts} attempts`,
      "RETRIES_EXHAUSTED",
      { attempts },
      { cause }
    );
    this.name = "RetriesExhaustedError";
  }
}

export class PayloadParseError extends AppError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, "PAYLOAD_PARSE_ERROR", context, { cause });
    this.name = "PayloadParseError";
  }
}

export class StorageInitError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE_INIT_ERROR", undefined, { cause });
    this.name = "StorageInitError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
