/**
 * Error taxonomy for the court forms service.
 *
 * - InvalidArgument: malformed or missing request fields (400)
 * - SearchUnavailable: embedding provider or vector store unreachable or
 *   timed out (503, safe for the caller to retry)
 * - NotFound: unknown route (404). A question with no guidance match is not
 *   an error and never raises this.
 *
 * Anything else reaching the error handler is reported as an internal error
 * without its message.
 */
export type AppErrorType =
  | "InvalidArgument"
  | "SearchUnavailable"
  | "NotFound"
  | "InternalError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "InternalError",
    statusCode = 500,
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

export class InvalidArgumentError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "InvalidArgument", 400, metadata);
  }
}

export class SearchUnavailableError extends AppError {
  constructor(message: string, cause?: unknown, metadata?: AppErrorMetadata) {
    super(message, "SearchUnavailable", 503, metadata);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not Found") {
    super(message, "NotFound", 404);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Best-effort message extraction for logging arbitrary thrown values.
 */
export function describeError(error: unknown): { message: string; name?: string } {
  if (error instanceof Error) {
    return { message: error.message, name: error.name };
  }

  return { message: String(error) };
}
