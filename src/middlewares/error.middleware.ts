import { Request, Response, NextFunction } from "express";
import { HttpError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendError } from "../utils/response";

const statusOf = (err: unknown): number => {
  if (err instanceof HttpError) return err.status;
  // body-parser errors carry their own status (malformed JSON, payload too large)
  if (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 600
  ) {
    return err.status;
  }
  return 500;
};

export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const status = statusOf(err);
  const message =
    err instanceof HttpError || (err instanceof Error && status < 500)
      ? err.message
      : "Internal Server Error";

  if (status >= 500) {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
  } else {
    logger.warn(`Request rejected (${status}) on ${req.method} ${req.originalUrl}: ${message}`);
  }

  sendError(
    res,
    message,
    status,
    undefined,
    err instanceof HttpError ? err.details : undefined
  );
}

export function notFoundMiddleware(req: Request, res: Response) {
  sendError(res, `Route ${req.method} ${req.originalUrl} not found`, 404);
}
