/**
 * Application error hierarchy shared by the store, use cases and HTTP layer.
 *
 * Every error carries a `type` (surfaced to clients as `code`), an optional
 * HTTP status and free-form metadata for structured logging.
 */
export type AppErrorType =
  | "InfrastructureError"
  | "AppError"
  | "ValidationError"
  | "ConflictError"
  | "NotFoundError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

/** Unique-constraint violation, e.g. a Slack message that was already ingested. */
export class ConflictError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ConflictError", 409, metadata);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "NotFoundError", 404, metadata);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
