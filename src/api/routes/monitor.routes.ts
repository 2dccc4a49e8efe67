/**
 * Monitor Routes
 *
 * Run-now and cancel for a single subscription.
 * Protected by service-to-service authentication.
 */
import { Router } from "express";
import type { MonitorController } from "../controllers/monitor.controller";
import { authMiddleware } from "../middlewares/auth.middleware";

export function createMonitorRoutes(controller: MonitorController): Router {
  const router = Router();

  router.use(authMiddleware);

  router.post("/:id/run", controller.runNow);
  router.post("/:id/cancel", controller.cancel);

  return router;
}
