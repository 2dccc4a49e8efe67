import { Router } from "express";
import type { SearchController } from "../controllers/search.controller";
import { authMiddleware } from "../middlewares/auth.middleware";

export function createSearchRoutes(controller: SearchController): Router {
  const router = Router();
  router.post("/", authMiddleware, controller.search);
  return router;
}
