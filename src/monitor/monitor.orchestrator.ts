/**
 * Monitor Orchestrator
 *
 * Runs one monitoring cycle per subscription and keeps its chain of
 * delayed jobs going.
 *
 * Flow per cycle:
 * 1. Load the subscription (skip if missing, inactive or not yet due)
 * 2. Search the window since the last check (with overlap), or the
 *    retroactive window on the first check
 * 3. For each publication not already stored: classify, summarize,
 *    link to its case, store, notify
 * 4. Success: stamp lastCheckedAt, log SUCCESS, schedule the next cycle
 * 5. Failure: log ERROR, schedule a retry, or after the last retry log
 *    FAILURE and fall back to the regular interval
 *
 * A cancelled cycle records CANCELLED and leaves lastCheckedAt and the
 * schedule untouched.
 */
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { ERROR_CODES, MONITOR_LOG_STATUS } from "../config/constants";
import {
  CycleCancelledError,
  ScrapeError,
  SearchFailedError,
  toError,
} from "../shared/errors/scrape.errors";
import type {
  ClassifiedPublication,
  CycleOutcome,
  MonitorJob,
  MonitorLogEntry,
  MonitorSubscription,
  NotificationChannelName,
} from "../shared/types/monitor.types";
import type { Publication } from "../shared/types/search.types";
import { hoursToMs } from "../shared/utils/date";
import { classifyPriority } from "../processing/priority-classifier";
import { summarize } from "../processing/summarizer";
import { logger } from "../monitoring/logger";
import { metrics } from "../monitoring/metrics.collector";
import {
  type MonitorPolicy,
  computeNextCheckDelay,
  defaultMonitorPolicy,
  isDue,
  searchWindow,
} from "./due-calculator";
import type {
  MonitorScheduler,
  PublicationNotifier,
  PublicationSearcher,
  PublicationStore,
} from "./ports";

/** Jobs firing up to this much before the due instant still run */
const DUE_TOLERANCE_MS = 60_000;

export interface MonitorOrchestratorDeps {
  store: PublicationStore;
  scheduler: MonitorScheduler;
  notifier: PublicationNotifier;
  searcher: PublicationSearcher;
  policy?: Partial<MonitorPolicy>;
  clock?: () => Date;
}

export class MonitorOrchestrator {
  private readonly store: PublicationStore;
  private readonly scheduler: MonitorScheduler;
  private readonly notifier: PublicationNotifier;
  private readonly searcher: PublicationSearcher;
  private readonly policy: MonitorPolicy;
  private readonly clock: () => Date;
  /** Abort handles of cycles running in this process, by subscription */
  private readonly inFlight = new Map<number, AbortController>();

  constructor(deps: MonitorOrchestratorDeps) {
    this.store = deps.store;
    this.scheduler = deps.scheduler;
    this.notifier = deps.notifier;
    this.searcher = deps.searcher;
    this.policy = { ...defaultMonitorPolicy(), ...deps.policy };
    this.clock = deps.clock ?? (() => new Date());
  }

  computeNextCheckDelay(subscription: MonitorSubscription, now: Date = this.clock()): number {
    return computeNextCheckDelay(subscription, now, this.policy);
  }

  /**
   * Queue the next regular cycle for a subscription.
   * Returns the delay used, or null for an inactive subscription.
   */
  async scheduleNext(subscription: MonitorSubscription): Promise<number | null> {
    if (!subscription.isActive) {
      logger.debug({ subscriptionId: subscription.id }, "Subscription inactive, not scheduling");
      return null;
    }

    const now = this.clock();
    const delay = this.computeNextCheckDelay(subscription, now);
    await this.scheduler.scheduleAfter(delay, this.regularJob(subscription.id, now, delay));

    logger.info(
      { subscriptionId: subscription.id, delayMinutes: +(delay / 60_000).toFixed(1) },
      "Monitor cycle scheduled"
    );
    return delay;
  }

  /**
   * Schedule every active subscription. One failing subscription does
   * not stop the sweep. Returns how many were scheduled.
   */
  async scheduleAll(): Promise<number> {
    const subscriptions = await this.store.listActiveSubscriptions();
    let scheduled = 0;

    for (const subscription of subscriptions) {
      try {
        if ((await this.scheduleNext(subscription)) !== null) {
          scheduled++;
        }
      } catch (error) {
        logger.error(
          { subscriptionId: subscription.id, error: toError(error).message },
          "Failed to schedule monitor cycle"
        );
      }
    }

    logger.info({ total: subscriptions.length, scheduled }, "Monitor sweep scheduled");
    return scheduled;
  }

  /**
   * Queue an immediate cycle that runs even if the subscription is not due.
   * Returns false when the subscription does not exist or is inactive.
   */
  async triggerNow(subscriptionId: number): Promise<boolean> {
    const subscription = await this.store.getSubscription(subscriptionId);
    if (!subscription || !subscription.isActive) return false;

    await this.scheduler.scheduleAfter(0, {
      subscriptionId,
      attempt: 0,
      dueAt: this.clock().toISOString(),
      force: true,
    });
    logger.info({ subscriptionId }, "Immediate monitor cycle requested");
    return true;
  }

  /**
   * Abort the cycle in flight for a subscription.
   * Returns false when nothing was running.
   */
  cancel(subscriptionId: number): boolean {
    const controller = this.inFlight.get(subscriptionId);
    if (!controller) return false;

    controller.abort();
    logger.info({ subscriptionId }, "Monitor cycle cancellation requested");
    return true;
  }

  isRunning(subscriptionId: number): boolean {
    return this.inFlight.has(subscriptionId);
  }

  async runCycle(job: MonitorJob): Promise<CycleOutcome> {
    const runId = uuidv4();
    const log = logger.child({ runId, subscriptionId: job.subscriptionId, attempt: job.attempt });

    let subscription: MonitorSubscription | null;
    try {
      subscription = await this.store.getSubscription(job.subscriptionId);
    } catch (error) {
      // Interval unknown without the row; the retry chain still continues
      return this.finish(await this.handleFailure(job.subscriptionId, null, job, 0, error, log));
    }
    if (!subscription || !subscription.isActive) {
      log.info("Subscription missing or inactive, skipping cycle");
      return this.finish(skipped(job.subscriptionId));
    }

    const now = this.clock();
    if (!job.force && job.attempt === 0 && !isDue(subscription, now, DUE_TOLERANCE_MS)) {
      // Another chain already checked this subscription
      log.info({ dueAt: job.dueAt }, "Subscription not yet due, skipping duplicate cycle");
      return this.finish(skipped(job.subscriptionId));
    }

    if (this.inFlight.has(subscription.id)) {
      log.warn("Cycle already running for subscription, skipping");
      return this.finish(skipped(job.subscriptionId));
    }

    const controller = new AbortController();
    this.inFlight.set(subscription.id, controller);
    const startedAt = Date.now();
    let found = 0;

    try {
      log.info(
        { barNumber: subscription.barNumber, stateCode: subscription.stateCode },
        "Monitor cycle started"
      );

      const window = searchWindow(subscription, now, this.policy);
      const result = await this.searcher.searchByPeriod(
        subscription.barNumber,
        subscription.stateCode,
        window.startDate,
        window.endDate,
        { signal: controller.signal }
      );
      throwIfCancelled(controller.signal);

      if (result.error !== null) {
        throw new SearchFailedError(result.error);
      }
      found = result.publications.length;

      const created = await this.ingest(subscription, result.publications, controller.signal);

      await this.store.updateLastChecked(subscription.id, now);
      await this.store.recordMonitorLog({
        subscriptionId: subscription.id,
        status: MONITOR_LOG_STATUS.SUCCESS,
        publicationsFound: found,
        publicationsNew: created,
        message: "Monitoring completed successfully",
      });

      const nextRunInMs = hoursToMs(subscription.intervalHours);
      await this.scheduler.scheduleAfter(nextRunInMs, this.regularJob(subscription.id, now, nextRunInMs));

      log.info(
        { publicationsFound: found, publicationsNew: created, durationMs: Date.now() - startedAt },
        "Monitor cycle completed"
      );

      return this.finish(
        {
          subscriptionId: subscription.id,
          status: "completed",
          publicationsFound: found,
          publicationsNew: created,
          nextRunInMs,
        },
        startedAt
      );
    } catch (error) {
      if (error instanceof CycleCancelledError || controller.signal.aborted) {
        return this.finish(await this.handleCancelled(subscription, found, log), startedAt);
      }
      return this.finish(
        await this.handleFailure(subscription.id, subscription.intervalHours, job, found, error, log),
        startedAt
      );
    } finally {
      if (this.inFlight.get(subscription.id) === controller) {
        this.inFlight.delete(subscription.id);
      }
    }
  }

  /** Stores and notifies the publications not seen before. Returns how many were new. */
  private async ingest(
    subscription: MonitorSubscription,
    publications: Publication[],
    signal: AbortSignal
  ): Promise<number> {
    let created = 0;

    for (const publication of publications) {
      throwIfCancelled(signal);

      if (await this.store.findByIdentityHash(publication.identityHash)) {
        continue;
      }

      const { priority, keywords } = classifyPriority(publication.content);
      const summary = summarize(publication.content);
      const caseRef = await this.store.getOrCreateCase(
        publication.caseNumber,
        { tribunalName: publication.tribunalName, court: publication.court },
        subscription.id
      );

      const classified: ClassifiedPublication = Object.freeze({
        ...publication,
        priority,
        keywords: Object.freeze([...keywords]),
        summary,
        caseId: caseRef.id,
      });

      if (!(await this.store.createPublication(classified))) {
        // Stored by a concurrent cycle between the lookup and the insert
        logger.debug(
          { subscriptionId: subscription.id, identityHash: publication.identityHash },
          "Publication already stored"
        );
        continue;
      }

      created++;
      metrics.increment("publications_ingested_total");
      const channels = await this.notifySafely(subscription, classified);
      if (channels.length > 0) {
        await this.markNotifiedSafely(classified.identityHash, channels);
      }
    }

    return created;
  }

  private async notifySafely(
    subscription: MonitorSubscription,
    publication: ClassifiedPublication
  ): Promise<NotificationChannelName[]> {
    try {
      return await this.notifier.notify(subscription, publication, publication.priority, publication.summary);
    } catch (error) {
      logger.error(
        {
          subscriptionId: subscription.id,
          caseNumber: publication.caseNumber,
          error: toError(error).message,
        },
        "Notification failed"
      );
      return [];
    }
  }

  private async markNotifiedSafely(
    identityHash: string,
    channels: NotificationChannelName[]
  ): Promise<void> {
    try {
      await this.store.markNotified(identityHash, channels);
    } catch (error) {
      // The publication is stored; only the delivery flags are missing
      logger.error(
        { identityHash, channels, error: toError(error).message },
        "Failed to record notification delivery"
      );
    }
  }

  /**
   * Log the failure and keep the chain going: a retry while the budget
   * lasts, then the regular interval. Without a loaded subscription the
   * interval is unknown and the retry backoff is used instead.
   */
  private async handleFailure(
    subscriptionId: number,
    intervalHours: number | null,
    job: MonitorJob,
    found: number,
    error: unknown,
    log: Logger
  ): Promise<CycleOutcome> {
    const err = toError(error);
    const errorCode = error instanceof ScrapeError ? error.code : ERROR_CODES.UNKNOWN;
    const attemptsMade = job.attempt + 1;

    log.error({ errorCode, error: err.message }, "Monitor cycle failed");

    await this.recordLogSafely({
      subscriptionId,
      status: MONITOR_LOG_STATUS.ERROR,
      publicationsFound: found,
      publicationsNew: 0,
      message: `Failed to fetch publications: ${err.message}`,
      error: err.message,
    });

    const now = this.clock();

    if (job.attempt < this.policy.maxRetries) {
      const delay = this.policy.retryBackoffMs;
      const scheduled = await this.scheduleSafely(
        delay,
        {
          subscriptionId,
          attempt: attemptsMade,
          dueAt: new Date(now.getTime() + delay).toISOString(),
        },
        log
      );
      if (scheduled) {
        log.warn({ retryInMs: delay, nextAttempt: attemptsMade }, "Monitor cycle retry scheduled");
      }

      return {
        subscriptionId,
        status: "retry_scheduled",
        publicationsFound: found,
        publicationsNew: 0,
        ...(scheduled ? { nextRunInMs: delay } : {}),
        error: err.message,
      };
    }

    await this.recordLogSafely({
      subscriptionId,
      status: MONITOR_LOG_STATUS.FAILURE,
      publicationsFound: found,
      publicationsNew: 0,
      message: `Permanent failure after ${attemptsMade} attempts`,
      error: err.message,
    });

    const delay = intervalHours === null ? this.policy.retryBackoffMs : hoursToMs(intervalHours);
    const scheduled = await this.scheduleSafely(delay, this.regularJob(subscriptionId, now, delay), log);
    log.error({ attemptsMade, nextRunInMs: delay }, "Monitor cycle failed permanently");

    return {
      subscriptionId,
      status: "failed_permanently",
      publicationsFound: found,
      publicationsNew: 0,
      ...(scheduled ? { nextRunInMs: delay } : {}),
      error: err.message,
    };
  }

  /** Returns false when the queue rejected the job; the daily sweep picks the subscription up again */
  private async scheduleSafely(delayMs: number, job: MonitorJob, log: Logger): Promise<boolean> {
    try {
      await this.scheduler.scheduleAfter(delayMs, job);
      return true;
    } catch (error) {
      log.error(
        { delayMs, nextAttempt: job.attempt, error: toError(error).message },
        "Failed to schedule follow-up monitor cycle"
      );
      return false;
    }
  }

  private async handleCancelled(
    subscription: MonitorSubscription,
    found: number,
    log: Logger
  ): Promise<CycleOutcome> {
    log.warn("Monitor cycle cancelled");

    await this.recordLogSafely({
      subscriptionId: subscription.id,
      status: MONITOR_LOG_STATUS.CANCELLED,
      publicationsFound: found,
      publicationsNew: 0,
      message: "Monitoring cycle cancelled",
      error: null,
    });

    return {
      subscriptionId: subscription.id,
      status: "cancelled",
      publicationsFound: found,
      publicationsNew: 0,
    };
  }

  /** Log writes on the failure paths must not prevent rescheduling */
  private async recordLogSafely(entry: MonitorLogEntry): Promise<void> {
    try {
      await this.store.recordMonitorLog(entry);
    } catch (error) {
      logger.error(
        { subscriptionId: entry.subscriptionId, status: entry.status, error: toError(error).message },
        "Failed to record monitor log"
      );
    }
  }

  private regularJob(subscriptionId: number, now: Date, delayMs: number): MonitorJob {
    return {
      subscriptionId,
      attempt: 0,
      dueAt: new Date(now.getTime() + delayMs).toISOString(),
    };
  }

  private finish(outcome: CycleOutcome, startedAt?: number): CycleOutcome {
    metrics.increment("monitor_cycles_total", { status: outcome.status });
    if (startedAt !== undefined) {
      metrics.recordDuration((Date.now() - startedAt) / 1000);
    }
    return outcome;
  }
}

function skipped(subscriptionId: number): CycleOutcome {
  return { subscriptionId, status: "skipped", publicationsFound: 0, publicationsNew: 0 };
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CycleCancelledError();
  }
}
