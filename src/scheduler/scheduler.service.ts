/**
 * Scheduler Service
 *
 * Daily node-cron sweep that (re)schedules a monitor cycle for every
 * active subscription. Cycles chain themselves afterwards; the sweep
 * picks up new subscriptions and repairs chains lost with Redis data.
 * Duplicate jobs are absorbed by the deterministic job id.
 *
 * Default schedule: 06:00 every day (SCHEDULER_CRON).
 */
import cron, { type ScheduledTask } from "node-cron";
import config from "../config";
import type { MonitorOrchestrator } from "../monitor/monitor.orchestrator";
import { toError } from "../shared/errors/scrape.errors";
import { logger } from "../monitoring/logger";

export type SweepTarget = Pick<MonitorOrchestrator, "scheduleAll">;

let isRunning = false;
let task: ScheduledTask | null = null;

/**
 * Run one sweep. Returns how many subscriptions were scheduled, or null
 * when a sweep was already in progress.
 */
export async function runSweep(target: SweepTarget): Promise<number | null> {
  if (isRunning) {
    logger.warn("Scheduler sweep already in progress, skipping");
    return null;
  }

  isRunning = true;
  const startTime = Date.now();

  try {
    logger.info("Scheduler sweep started");
    const scheduled = await target.scheduleAll();
    logger.info({ durationMs: Date.now() - startTime, scheduled }, "Scheduler sweep completed");
    return scheduled;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler cron job.
 */
export function startScheduler(target: SweepTarget, cronExpression: string = config.schedulerCron): void {
  if (task) return;

  logger.info({ cronExpression }, "Starting scheduler");

  task = cron.schedule(
    cronExpression,
    async () => {
      try {
        await runSweep(target);
      } catch (error) {
        logger.error({ error: toError(error).message }, "Scheduler sweep failed");
      }
    },
    { timezone: "America/Sao_Paulo" }
  );
}

export function stopScheduler(): void {
  task?.stop();
  task = null;
}
