/**
 * Queue Producer
 *
 * BullMQ implementation of the MonitorScheduler port.
 *
 * Job IDs follow the pattern: monitor-{subscriptionId}-{attempt}-{dueAtMs}
 * Scheduling the same cycle twice (a daily sweep racing a running chain)
 * therefore adds a single job.
 */
import { Queue } from "bullmq";
import type { MonitorScheduler } from "../monitor/ports";
import type { MonitorJob } from "../shared/types/monitor.types";
import { logger } from "../monitoring/logger";

export function monitorJobId(job: MonitorJob): string {
  return `monitor-${job.subscriptionId}-${job.attempt}-${Date.parse(job.dueAt)}`;
}

export class BullMqMonitorScheduler implements MonitorScheduler {
  constructor(private readonly queue: Queue<MonitorJob>) {}

  async scheduleAfter(delayMs: number, job: MonitorJob): Promise<void> {
    const jobId = monitorJobId(job);

    await this.queue.add(jobId, job, {
      jobId, // Deduplication: same ID won't be added twice
      delay: Math.max(0, Math.round(delayMs)),
    });

    logger.debug(
      { jobId, subscriptionId: job.subscriptionId, attempt: job.attempt, delayMs },
      "Monitor job enqueued"
    );
  }
}

export interface QueueStatus {
  name: string;
  waiting: number;
  delayed: number;
  active: number;
  completed: number;
  failed: number;
}

/** Job counts by state, for the status endpoint */
export async function getQueueStatus(queue: Queue<MonitorJob>): Promise<QueueStatus> {
  const counts = await queue.getJobCounts("waiting", "delayed", "active", "completed", "failed");
  return {
    name: queue.name,
    waiting: counts.waiting ?? 0,
    delayed: counts.delayed ?? 0,
    active: counts.active ?? 0,
    completed: counts.completed ?? 0,
    failed: counts.failed ?? 0,
  };
}
