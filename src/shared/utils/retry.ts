/**
 * Exponential Backoff Helpers
 *
 * Shared by the fetch client (per-request retries). BullMQ delays
 * handle the monitor-cycle retries; this is for sub-operation retries.
 */

export interface BackoffPolicy {
  /** Delay before the first retry */
  baseDelayMs: number;
  /** Multiply delay by this factor on each retry (default: 2) */
  multiplier?: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
}

/**
 * Delay to wait after the given failed attempt (1-based).
 * min(base * multiplier^(attempt-1), maxDelay)
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  const { baseDelayMs, multiplier = 2, maxDelayMs } = policy;
  const delay = baseDelayMs * Math.pow(multiplier, Math.max(0, attempt - 1));
  return Math.min(delay, maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
