/**
 * Entry Point: oab-publication-monitor
 *
 * Starts the three main subsystems:
 * 1. API Server: Express endpoints for run/cancel, ad-hoc search and monitoring
 * 2. Workers: BullMQ worker that runs monitor cycles
 * 3. Scheduler: daily node-cron sweep over active subscriptions
 *
 * The API and the worker share one orchestrator, so a cancel request
 * reaches cycles running in this process.
 */
import config from "./config";
import sequelize from "./persistence/db/sequelize";
import "./persistence/db/models"; // Ensure models are registered
import { startServer } from "./api/server";
import { startScheduler, stopScheduler } from "./scheduler/scheduler.service";
import { startWorkers, stopWorkers } from "./workers/worker.manager";
import { MonitorOrchestrator } from "./monitor/monitor.orchestrator";
import { SequelizePublicationStore } from "./persistence/repositories/publication.store";
import { BullMqMonitorScheduler, getQueueStatus } from "./queue/queue.producer";
import { monitorQueue, redisConnection } from "./queue/queue.config";
import { SearchService } from "./scraping/search/search.service";
import { createNotificationDispatcher } from "./notifications/notification.dispatcher";
import { checkHealth } from "./monitoring/health.checker";
import { toError } from "./shared/errors/scrape.errors";
import { logger } from "./monitoring/logger";

async function main(): Promise<void> {
  logger.info({ env: config.env, port: config.port }, "Starting oab-publication-monitor service");

  // 1. Verify database connection
  try {
    await sequelize.authenticate();
    logger.info("Database connection established");
  } catch (error) {
    logger.fatal(
      { error: toError(error).message },
      "Failed to connect to database, aborting startup"
    );
    process.exit(1);
  }

  const searcher = new SearchService();
  const orchestrator = new MonitorOrchestrator({
    store: new SequelizePublicationStore(),
    scheduler: new BullMqMonitorScheduler(monitorQueue),
    notifier: createNotificationDispatcher(),
    searcher,
  });

  // 2. Start API server
  await startServer({
    monitor: orchestrator,
    searcher,
    health: () => checkHealth(sequelize, redisConnection),
    queueStatus: () => getQueueStatus(monitorQueue),
  });

  // 3. Start BullMQ worker
  await startWorkers(orchestrator);

  // 4. Schedule every active subscription now, then daily
  await orchestrator.scheduleAll();
  startScheduler(orchestrator);

  logger.info("All subsystems started, service is ready");
}

// --- Graceful Shutdown ---
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutdown signal received");

  try {
    stopScheduler();
    await stopWorkers();
    await monitorQueue.close();
    await redisConnection.quit();
    await sequelize.close();
    logger.info("Graceful shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error({ error: toError(error).message }, "Error during shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

// Start the service
main().catch((error: unknown) => {
  logger.fatal({ error: toError(error).message }, "Failed to start service");
  process.exit(1);
});
