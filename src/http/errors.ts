import type { NextFunction, Request, RequestHandler, Response } from "express";
import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../core/entities/appError";
import { logger, toErrorDetails } from "../shared/logger/logger";

const STATUS_BY_CODE: Partial<Record<AppBoundaryErrorCode, number>> = {
  validation_error: 400,
  forbidden: 403,
  not_found: 404,
  rate_limited: 429,
  timeout: 504,
  config_invalid: 500,
};

/**
 * Upstream failures without a dedicated status surface as 502 Bad Gateway.
 */
export const httpStatusFor = (error: AppBoundaryError): number =>
  STATUS_BY_CODE[error.code] ?? 502;

export const sendBoundaryError = (
  res: Response,
  error: AppBoundaryError,
): void => {
  const status = httpStatusFor(error);
  if (status >= 500) {
    logger.warn(
      {
        source: error.source,
        provider: error.provider,
        code: error.code,
        httpStatus: error.httpStatus,
        message: error.message,
      },
      "Request failed at an upstream boundary",
    );
  }

  res.status(status).json({
    error: { code: error.code, message: error.message },
  });
};

/**
 * Forwards rejected handler promises to the express error middleware.
 */
export const asyncHandler =
  (
    handler: (req: Request, res: Response) => Promise<void>,
  ): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({
    error: { code: "not_found", message: "Route not found" },
  });
};

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  logger.error(
    { error: toErrorDetails(error), method: req.method, path: req.path },
    "Unhandled request error",
  );

  if (res.headersSent) {
    next(error);
    return;
  }

  res.status(500).json({
    error: { code: "internal_error", message: "Internal server error" },
  });
};
