/**
 * BullMQ Queue Configuration
 *
 * A single delayed-job queue drives monitoring: every job is one cycle
 * for one subscription, and each cycle enqueues its own successor.
 *
 * Retries are not left to BullMQ: the orchestrator schedules them as
 * new delayed jobs so the attempt number travels in the payload and
 * the backoff follows the monitor policy.
 */
import { Queue, type QueueOptions } from "bullmq";
import IORedis from "ioredis";
import config from "../config";
import { QUEUE_NAMES } from "../config/constants";
import type { MonitorJob } from "../shared/types/monitor.types";
import { logger } from "../monitoring/logger";

/**
 * Shared Redis connection for the queue and its worker.
 * Using IORedis with maxRetriesPerRequest: null as required by BullMQ.
 */
export const redisConnection = new IORedis({
  host: config.redisHost,
  port: config.redisPort,
  password: config.redisPassword,
  maxRetriesPerRequest: null, // Required by BullMQ
  enableReadyCheck: false,
});

redisConnection.on("connect", () => {
  logger.info({ host: config.redisHost, port: config.redisPort }, "Redis connected");
});

redisConnection.on("error", (err) => {
  logger.error({ error: err.message }, "Redis connection error");
});

const queueOptions: QueueOptions = {
  connection: redisConnection,
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: { count: 1000 }, // Keep last 1000 completed jobs
    removeOnFail: { count: 5000 },
  },
};

/** Delayed per-subscription monitor cycles */
export const monitorQueue = new Queue<MonitorJob>(QUEUE_NAMES.MONITOR, queueOptions);
