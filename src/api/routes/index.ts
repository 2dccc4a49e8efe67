/**
 * Route Aggregator
 *
 * Mounts all API routes under the /api/monitor/v1 prefix.
 */
import { Router } from "express";
import { createMonitorController, type MonitorControl } from "../controllers/monitor.controller";
import { type AdHocSearcher, createSearchController } from "../controllers/search.controller";
import { createStatusController, type StatusSources } from "../controllers/status.controller";
import { createMonitorRoutes } from "./monitor.routes";
import { createSearchRoutes } from "./search.routes";
import { createStatusRoutes } from "./status.routes";

export interface ApiDependencies extends StatusSources {
  monitor: MonitorControl;
  searcher: AdHocSearcher;
}

export function createRoutes(deps: ApiDependencies): Router {
  const router = Router();

  router.use("/subscriptions", createMonitorRoutes(createMonitorController(deps.monitor)));
  router.use("/search", createSearchRoutes(createSearchController(deps.searcher)));
  router.use("/", createStatusRoutes(createStatusController(deps)));

  return router;
}
