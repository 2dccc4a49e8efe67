/**
 * Error Middleware
 *
 * Global error handler for the Express API.
 * Input errors become 400 with their details; anything else is a 500.
 */
import type { Request, Response, NextFunction } from "express";
import config from "../../config";
import { ValidationError } from "../../shared/errors/scrape.errors";
import { logger } from "../../monitoring/logger";

export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message, details: err.details });
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      method: req.method,
      path: req.path,
    },
    "Unhandled API error"
  );

  res.status(500).json({
    error: "Internal Server Error",
    message: config.env === "development" ? err.message : undefined,
  });
}
