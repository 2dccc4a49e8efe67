/**
 * Monitor Worker
 *
 * Processes one monitor job: hands the payload to the orchestrator and
 * reports the cycle outcome. Cycle failures are handled (logged and
 * rescheduled) inside the orchestrator, so the job itself only fails
 * on an unexpected error.
 */
import type { Job } from "bullmq";
import type { MonitorOrchestrator } from "../monitor/monitor.orchestrator";
import type { CycleOutcome, MonitorJob } from "../shared/types/monitor.types";
import { logger } from "../monitoring/logger";

export async function processMonitorJob(
  job: Job<MonitorJob>,
  orchestrator: MonitorOrchestrator
): Promise<CycleOutcome> {
  const { subscriptionId, attempt } = job.data;

  logger.info({ jobId: job.id, subscriptionId, attempt }, "Processing monitor job");

  const outcome = await orchestrator.runCycle(job.data);

  logger.info(
    {
      jobId: job.id,
      subscriptionId,
      status: outcome.status,
      publicationsFound: outcome.publicationsFound,
      publicationsNew: outcome.publicationsNew,
      nextRunInMs: outcome.nextRunInMs,
    },
    "Monitor job finished"
  );

  return outcome;
}
