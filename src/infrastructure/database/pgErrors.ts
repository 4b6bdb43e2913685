import {
  AppError,
  ConflictError,
  InfrastructureError,
  ValidationError,
  type AppErrorMetadata,
} from "@typesLocal/errors";

const UNIQUE_VIOLATION = "23505";
const NOT_NULL_VIOLATION = "23502";
const DATA_EXCEPTION = "22000";
const INVALID_TEXT_REPRESENTATION = "22P02";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "57P01",
  "57P03",
  "08000",
  "08001",
  "08003",
  "08006",
]);

function stringProp(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Translates a node-postgres error into the application error hierarchy.
 * Errors that are not recognised come back unchanged.
 */
export function mapPgError(error: unknown, context: AppErrorMetadata = {}): unknown {
  if (error instanceof AppError || !(error instanceof Error)) {
    return error;
  }

  const code = stringProp(error, "code");
  const details: AppErrorMetadata = {
    ...context,
    pgCode: code,
    constraint: stringProp(error, "constraint"),
    detail: stringProp(error, "detail"),
  };

  if (code === UNIQUE_VIOLATION) {
    return new ConflictError("Record already exists", details);
  }

  if (code === NOT_NULL_VIOLATION) {
    const column = stringProp(error, "column") ?? "unknown";
    return new ValidationError(`Missing required column ${column}`, {
      ...details,
      column,
    });
  }

  if (code === DATA_EXCEPTION && /expected \d+ dimensions/.test(error.message)) {
    return new ValidationError(error.message, details);
  }

  if (code === INVALID_TEXT_REPRESENTATION) {
    return new ValidationError(error.message, details);
  }

  if (code && CONNECTION_CODES.has(code)) {
    return new InfrastructureError("Database unavailable", 503, {
      ...details,
      message: error.message,
    });
  }

  return error;
}
