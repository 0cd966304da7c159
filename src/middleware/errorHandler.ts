/**
 * Global error handling middleware.
 *
 * Maps the AppError taxonomy to HTTP statuses and a `{ error, code, details? }`
 * body. Validation issues are returned as details; anything unexpected is
 * logged in full and reported as a generic internal error, so upstream
 * messages and stack traces never reach the client.
 */
import type { NextFunction, Request, Response } from "express";

import { logger } from "@infrastructure/logging/Logger";
import {
  AppError,
  describeError,
  InvalidArgumentError,
  isAppError,
  NotFoundError,
} from "@typesLocal/AppError";

const BODY_PARSER_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Request body must be valid JSON",
  "entity.too.large": "Request body too large",
  "entity.verify.failed": "Request body failed verification",
  "request.aborted": "Request body was not fully received",
  "request.size.invalid": "Request body length does not match Content-Length",
  "charset.unsupported": "Unsupported charset",
  "encoding.unsupported": "Unsupported content encoding",
};

function readStatus(err: Error): number | null {
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : null;
  return typeof status === "number" ? status : null;
}

/**
 * Maps an express.json (body-parser) rejection to a client error with the
 * parser's own 4xx status. Returns null for anything else.
 */
export function bodyParserFailure(
  err: unknown
): { type: string; error: AppError } | null {
  if (!(err instanceof Error) || !("type" in err) || typeof err.type !== "string") {
    return null;
  }

  const status = readStatus(err);
  if (status === null || status < 400 || status >= 500) {
    return null;
  }

  const message = BODY_PARSER_MESSAGES[err.type] ?? "Malformed request body";

  return {
    type: err.type,
    error:
      status === 400
        ? new InvalidArgumentError(message)
        : new AppError(message, "InvalidArgument", status),
  };
}

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  return (
    bodyParserFailure(err)?.error ??
    new AppError("Internal Server Error", "InternalError", 500)
  );
}

export function notFoundHandler(
  _req: Request,
  _res: Response,
  next: NextFunction
): void {
  next(new NotFoundError());
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode;

  logger.log(status >= 500 ? "error" : "warn", "HTTP_ERROR", {
    method: req.method,
    path: req.path,
    type: appError.type,
    statusCode: status,
    message: appError.message,
    originalError: appError === err ? undefined : describeError(err),
    cause:
      appError.cause !== undefined ? describeError(appError.cause) : undefined,
    stack: status >= 500 && err instanceof Error ? err.stack : undefined,
  });

  const issues = appError.metadata?.issues;

  res.status(status).json({
    error: appError.message,
    code: appError.type,
    ...(appError instanceof InvalidArgumentError && issues !== undefined
      ? { details: { issues } }
      : {}),
  });
}
