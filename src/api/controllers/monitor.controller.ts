/**
 * Monitor Controller
 *
 * Manual control over a subscription's monitor cycle:
 * run it now, or cancel the one in flight.
 */
import type { Request, Response } from "express";
import Joi from "joi";
import type { MonitorOrchestrator } from "../../monitor/monitor.orchestrator";
import { toError } from "../../shared/errors/scrape.errors";
import { logger } from "../../monitoring/logger";

export type MonitorControl = Pick<MonitorOrchestrator, "triggerNow" | "cancel">;

const subscriptionIdSchema = Joi.number().integer().min(1).required();

function readSubscriptionId(req: Request): number | null {
  const { error, value } = subscriptionIdSchema.validate(req.params.id);
  return error ? null : value;
}

export function createMonitorController(monitor: MonitorControl) {
  /**
   * POST /api/monitor/v1/subscriptions/:id/run
   */
  async function runNow(req: Request, res: Response): Promise<void> {
    const subscriptionId = readSubscriptionId(req);
    if (subscriptionId === null) {
      res.status(400).json({ error: "Invalid subscription id" });
      return;
    }

    try {
      const queued = await monitor.triggerNow(subscriptionId);
      if (!queued) {
        res.status(404).json({ error: "Subscription not found or inactive" });
        return;
      }
      res.status(202).json({ subscriptionId, queued: true });
    } catch (error) {
      logger.error({ subscriptionId, error: toError(error).message }, "Failed to trigger monitor cycle");
      res.status(500).json({ error: "Failed to trigger monitor cycle" });
    }
  }

  /**
   * POST /api/monitor/v1/subscriptions/:id/cancel
   */
  function cancel(req: Request, res: Response): void {
    const subscriptionId = readSubscriptionId(req);
    if (subscriptionId === null) {
      res.status(400).json({ error: "Invalid subscription id" });
      return;
    }

    if (!monitor.cancel(subscriptionId)) {
      res.status(409).json({ error: "No monitor cycle running for this subscription" });
      return;
    }
    res.status(202).json({ subscriptionId, cancelled: true });
  }

  return { runNow, cancel };
}

export type MonitorController = ReturnType<typeof createMonitorController>;
