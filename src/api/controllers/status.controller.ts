/**
 * Status Controller
 *
 * Provides queue status, health check, and metrics endpoints.
 */
import type { Request, Response } from "express";
import type { HealthReport } from "../../monitoring/health.checker";
import { metrics } from "../../monitoring/metrics.collector";
import type { QueueStatus } from "../../queue/queue.producer";
import { toError } from "../../shared/errors/scrape.errors";
import { logger } from "../../monitoring/logger";

export interface StatusSources {
  health: () => Promise<HealthReport>;
  queueStatus: () => Promise<QueueStatus>;
}

export function createStatusController(sources: StatusSources) {
  /**
   * GET /api/monitor/v1/status
   *
   * Job counts of the monitor queue.
   */
  async function getStatus(_req: Request, res: Response): Promise<void> {
    try {
      const queue = await sources.queueStatus();
      res.json({ queue, timestamp: new Date().toISOString() });
    } catch (error) {
      logger.error({ error: toError(error).message }, "Failed to get queue status");
      res.status(500).json({ error: "Failed to retrieve queue status" });
    }
  }

  /**
   * GET /api/monitor/v1/health
   *
   * Health check endpoint for load balancers and monitoring.
   */
  async function getHealth(_req: Request, res: Response): Promise<void> {
    try {
      const health = await sources.health();
      res.status(health.status === "healthy" ? 200 : 503).json(health);
    } catch (error) {
      res.status(503).json({ status: "unhealthy", error: toError(error).message });
    }
  }

  /**
   * GET /api/monitor/v1/metrics
   *
   * Prometheus-compatible metrics endpoint.
   */
  function getMetrics(_req: Request, res: Response): void {
    res.set("Content-Type", "text/plain");
    res.send(metrics.format());
  }

  return { getStatus, getHealth, getMetrics };
}

export type StatusController = ReturnType<typeof createStatusController>;
