/**
 * Auth Middleware
 *
 * Validates service-to-service authentication using a shared secret.
 * The back office includes this secret when it triggers or cancels cycles.
 */
import type { Request, Response, NextFunction } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";

/**
 * Validate the service secret from the Authorization header.
 * Expected format: Bearer <service-secret>
 */
export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    logger.warn({ ip: req.ip, path: req.path }, "Missing or invalid Authorization header");
    res.status(401).json({ error: "Unauthorized" });
    return;
  }

  if (authHeader.substring(7) !== config.serviceSecret) {
    logger.warn({ ip: req.ip, path: req.path }, "Invalid service secret");
    res.status(403).json({ error: "Forbidden" });
    return;
  }

  next();
}
