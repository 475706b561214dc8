import { Request, Response, NextFunction } from "express";
import { logger } from "./logger";

export class ApiError extends Error {
  statusCode: number;
  code: string;
  data?: unknown;

  constructor(message: string, statusCode = 500, data?: unknown, code = "INTERNAL_ERROR") {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

export class InvalidPageRequestError extends ApiError {
  constructor(message: string, data?: unknown) {
    super(message, 400, data, "INVALID_PAGINATION");
    Object.setPrototypeOf(this, InvalidPageRequestError.prototype);
  }
}

/**
 * The store cannot run this filter/sort combination, usually because a
 * composite index is missing. `detail` keeps the store's own message, which
 * names the index to create.
 */
export class UnsupportedFilterCombinationError extends ApiError {
  constructor(detail: string, context: { filters: string[]; sortField: string }) {
    super(
      `This listing is unavailable: the data store cannot run the requested filter/sort combination (sorted by ${context.sortField}).`,
      503,
      { retryable: false, ...context, detail },
      "UNSUPPORTED_FILTER_COMBINATION"
    );
    Object.setPrototypeOf(this, UnsupportedFilterCombinationError.prototype);
  }
}

export class StoreUnavailableError extends ApiError {
  constructor(message = "Data store temporarily unavailable, retry the request", statusCode = 503, code = "STORE_UNAVAILABLE") {
    super(message, statusCode, { retryable: true }, code);
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

export class PageTimeoutError extends StoreUnavailableError {
  constructor(timeoutMs: number) {
    super(`Page fetch did not complete within ${timeoutMs}ms, retry the request`, 504, "PAGE_TIMEOUT");
    Object.setPrototypeOf(this, PageTimeoutError.prototype);
  }
}

// Express error-handling middleware
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ApiError) {
    if (err.statusCode >= 500) {
      logger.warn({ code: err.code, data: err.data, path: req.originalUrl }, err.message);
    }
    return res.status(err.statusCode).json({
      responseStatus: "error",
      message: err.message,
      data: { code: err.code, ...(err.data && typeof err.data === "object" ? err.data : {}) },
    });
  }

  logger.error({ err, path: req.originalUrl }, "Unhandled error");
  return res.status(500).json({
    responseStatus: "error",
    message: "Internal Server Error",
    data: null,
  });
}
