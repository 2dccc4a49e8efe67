/**
 * Express API Server
 *
 * Minimal Express server for the monitor service.
 * Exposes run/cancel controls, ad-hoc search and monitoring routes.
 */
import type { Server } from "http";
import express from "express";
import cors from "cors";
import { type ApiDependencies, createRoutes } from "./routes";
import { errorMiddleware } from "./middlewares/error.middleware";
import { logger } from "../monitoring/logger";
import config from "../config";

export const API_PREFIX = "/api/monitor/v1";

/**
 * Create and configure the Express application.
 */
export function createServer(deps: ApiDependencies): express.Application {
  const app = express();

  // CORS
  app.use(cors());

  // Body parsing
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, "Incoming request");
    next();
  });

  // API routes
  app.use(API_PREFIX, createRoutes(deps));

  // Error handler
  app.use(errorMiddleware);

  return app;
}

/**
 * Start the Express server.
 */
export function startServer(deps: ApiDependencies, port: number = config.port): Promise<Server> {
  return new Promise((resolve) => {
    const server = createServer(deps).listen(port, () => {
      logger.info({ port, env: config.env }, "API server started");
      resolve(server);
    });
  });
}
