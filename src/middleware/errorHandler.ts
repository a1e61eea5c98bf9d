import type { NextFunction, Request, Response } from "express";
import { HttpError } from "../types.js";

/**
 * Answers HttpError with its status and `{ error, code? }`. Anything else, or
 * an error raised after the response started, goes on to Sentry's handler,
 * so this must be registered before setupExpressErrorHandler.
 */
export function httpErrorHandler(
  err: Error,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (!(err instanceof HttpError) || res.headersSent) {
    next(err);
    return;
  }
  if (err.statusCode >= 500) {
    console.warn(`Responding ${err.statusCode}:`, err.message);
  }
  res
    .status(err.statusCode)
    .json(err.code ? { error: err.message, code: err.code } : { error: err.message });
}
