/**
 * Worker Manager
 *
 * Creates and manages the BullMQ Worker for the monitor queue and
 * binds it to the orchestrator.
 */
import { type Job, Worker } from "bullmq";
import { QUEUE_NAMES } from "../config/constants";
import type { MonitorOrchestrator } from "../monitor/monitor.orchestrator";
import type { CycleOutcome, MonitorJob } from "../shared/types/monitor.types";
import { processMonitorJob } from "./monitor.worker";
import { monitorWorkerOptions } from "./worker.config";
import { logger } from "../monitoring/logger";

let worker: Worker<MonitorJob, CycleOutcome> | null = null;

/**
 * Start the monitor worker.
 */
export async function startWorkers(orchestrator: MonitorOrchestrator): Promise<void> {
  if (worker) return;

  worker = new Worker<MonitorJob, CycleOutcome>(
    QUEUE_NAMES.MONITOR,
    (job: Job<MonitorJob>) => processMonitorJob(job, orchestrator),
    monitorWorkerOptions
  );
  setupWorkerEvents(worker);

  logger.info({ concurrency: monitorWorkerOptions.concurrency }, "Monitor worker started");
}

function setupWorkerEvents(instance: Worker<MonitorJob, CycleOutcome>): void {
  instance.on("completed", (job, outcome) => {
    logger.debug(
      { jobId: job.id, subscriptionId: job.data.subscriptionId, status: outcome.status },
      "Job completed"
    );
  });

  instance.on("failed", (job, error) => {
    logger.error(
      {
        jobId: job?.id,
        subscriptionId: job?.data.subscriptionId,
        error: error.message,
        attemptsMade: job?.attemptsMade,
      },
      "Job failed"
    );
  });

  instance.on("error", (error) => {
    logger.error({ queue: QUEUE_NAMES.MONITOR, error: error.message }, "Worker error");
  });
}

/**
 * Gracefully shut down the worker, letting running cycles finish.
 */
export async function stopWorkers(): Promise<void> {
  if (!worker) return;

  logger.info("Stopping monitor worker...");
  await worker.close();
  worker = null;
  logger.info("Monitor worker stopped");
}
