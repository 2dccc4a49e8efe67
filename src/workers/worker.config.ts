/**
 * Worker Configuration
 *
 * BullMQ Worker settings for the monitor queue.
 * Concurrency bounds how many subscriptions are checked at once; the
 * registry rate limit itself lives in the shared fetch client.
 */
import type { WorkerOptions } from "bullmq";
import { redisConnection } from "../queue/queue.config";
import config from "../config";

export const monitorWorkerOptions: WorkerOptions = {
  connection: redisConnection,
  autorun: true,
  concurrency: Math.max(1, config.workerConcurrency),
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};
