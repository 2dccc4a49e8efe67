/**
 * Due Calculator
 *
 * When a subscription should next be checked, and which publication
 * window that check covers.
 */
import config from "../config";
import type { MonitorSubscription } from "../shared/types/monitor.types";
import { hoursToMs, subtractDays } from "../shared/utils/date";

export interface MonitorPolicy {
  /** Delay for a subscription never checked or already overdue */
  initialDelayMs: number;
  /** Delay before retrying a failed cycle */
  retryBackoffMs: number;
  /** Retries after the first failed attempt */
  maxRetries: number;
  /** Days re-read before lastCheckedAt so late entries are not missed */
  lookbackOverlapDays: number;
  /** Window of the very first check */
  retroactiveDays: number;
}

export function defaultMonitorPolicy(): MonitorPolicy {
  return {
    initialDelayMs: config.monitorInitialDelayMs,
    retryBackoffMs: config.monitorRetryBackoffMs,
    maxRetries: config.monitorMaxRetries,
    lookbackOverlapDays: config.monitorLookbackOverlapDays,
    retroactiveDays: config.monitorRetroactiveDays,
  };
}

/** Instant the subscription becomes due, or null if never checked */
export function nextDueAt(subscription: MonitorSubscription): Date | null {
  if (!subscription.lastCheckedAt) return null;
  return new Date(subscription.lastCheckedAt.getTime() + hoursToMs(subscription.intervalHours));
}

/**
 * Milliseconds until the next check.
 * Never checked or overdue: the initial delay. Otherwise the time left.
 */
export function computeNextCheckDelay(
  subscription: MonitorSubscription,
  now: Date,
  policy: Pick<MonitorPolicy, "initialDelayMs">
): number {
  const dueAt = nextDueAt(subscription);
  if (!dueAt) return policy.initialDelayMs;

  const remaining = dueAt.getTime() - now.getTime();
  return remaining <= 0 ? policy.initialDelayMs : remaining;
}

/**
 * @param toleranceMs - Jobs firing this early still count as due
 */
export function isDue(subscription: MonitorSubscription, now: Date, toleranceMs = 0): boolean {
  const dueAt = nextDueAt(subscription);
  return !dueAt || dueAt.getTime() - toleranceMs <= now.getTime();
}

export interface SearchWindow {
  startDate: Date;
  endDate: Date;
}

export function searchWindow(
  subscription: MonitorSubscription,
  now: Date,
  policy: Pick<MonitorPolicy, "lookbackOverlapDays" | "retroactiveDays">
): SearchWindow {
  const startDate = subscription.lastCheckedAt
    ? subtractDays(subscription.lastCheckedAt, policy.lookbackOverlapDays)
    : subtractDays(now, policy.retroactiveDays);
  return { startDate, endDate: now };
}
