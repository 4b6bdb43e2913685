/**
 * Global error handling middleware.
 *
 * AppErrors keep their status and type; anything else becomes an
 * InfrastructureError, keeping a numeric `status`/`statusCode` when the thrown
 * value carries one (body-parser sets these on malformed JSON).
 *
 * Response body: `{ error: { message, code, details } }`.
 */
import { describeError, logger } from "@infrastructure/logging/Logger";
import {
  AppError,
  InfrastructureError,
  NotFoundError,
  isAppError,
} from "@typesLocal/errors";
import type { NextFunction, Request, Response } from "express";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("statusCode" in err && typeof err.statusCode === "number") {
      return err.statusCode;
    }
    if ("status" in err && typeof err.status === "number") {
      return err.status;
    }
  }
  return 500;
}

function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const status = statusOf(err);
  const message =
    status < 500 && err instanceof Error ? err.message : "Internal Server Error";

  return new InfrastructureError(message, status, {});
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new NotFoundError("Route not found", { method: req.method, path: req.path }));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    method: req.method,
    path: req.path,
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : describeError(err).message,
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}
