/**
 * Status Routes
 *
 * API routes for monitoring: queue status, health, metrics.
 * Health and metrics endpoints are public (for load balancers).
 * Status endpoint is protected.
 */
import { Router } from "express";
import type { StatusController } from "../controllers/status.controller";
import { authMiddleware } from "../middlewares/auth.middleware";

export function createStatusRoutes(controller: StatusController): Router {
  const router = Router();

  // Public endpoints (health checks, metrics scraping)
  router.get("/health", controller.getHealth);
  router.get("/metrics", controller.getMetrics);

  // Protected endpoint
  router.get("/status", authMiddleware, controller.getStatus);

  return router;
}
