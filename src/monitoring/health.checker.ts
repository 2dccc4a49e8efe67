/**
 * Health Checker
 *
 * Performs connectivity checks against all external dependencies:
 * - MySQL database (subscriptions, publications, logs)
 * - Redis (BullMQ backend)
 *
 * Exposed via GET /api/monitor/v1/health
 */
import type { Sequelize } from "sequelize";
import type { Redis } from "ioredis";
import { logger } from "./logger";

export interface HealthCheck {
  status: "up" | "down";
  latency?: number;
  error?: string;
}

export interface HealthReport {
  status: "healthy" | "unhealthy";
  uptime: number;
  checks: {
    database: HealthCheck;
    redis: HealthCheck;
  };
}

const startTime = Date.now();

/**
 * Run all health checks and produce a report.
 * Unhealthy when either dependency is down.
 */
export async function checkHealth(sequelize: Sequelize, redis: Redis): Promise<HealthReport> {
  const [database, redisCheck] = await Promise.all([
    probe("Database", () => sequelize.authenticate()),
    probe("Redis", () => redis.ping()),
  ]);

  const allUp = database.status === "up" && redisCheck.status === "up";

  return {
    status: allUp ? "healthy" : "unhealthy",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: { database, redis: redisCheck },
  };
}

async function probe(name: string, check: () => Promise<unknown>): Promise<HealthCheck> {
  const start = Date.now();
  try {
    await check();
    return { status: "up", latency: Date.now() - start };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    logger.error({ error: msg }, `${name} health check failed`);
    return { status: "down", latency: Date.now() - start, error: msg };
  }
}
