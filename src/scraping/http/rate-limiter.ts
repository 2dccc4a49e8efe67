/**
 * Rate Limiter
 *
 * Minimum-interval limiter for registry requests. One instance is owned
 * by each FetchClient and shared by every request it issues, including
 * the concurrent page fan-out.
 *
 * Slots are reserved synchronously inside acquire(), before the first
 * await, so concurrent callers can never observe the same free slot.
 */
import config from "../../config";
import { CycleCancelledError } from "../../shared/errors/scrape.errors";
import { sleep as defaultSleep } from "../../shared/utils/retry";

export interface RateLimiterOptions {
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  /** Earliest instant the next request may start */
  private nextSlotAt = 0;

  constructor(
    minIntervalMs: number = config.rateLimitIntervalMs,
    options: RateLimiterOptions = {}
  ) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait until a request may be issued.
   * Returns the wait time in ms. Rejects with CycleCancelledError when
   * `signal` is aborted before or during the wait; an abandoned slot is
   * released if no later caller has reserved behind it.
   */
  async acquire(signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      throw new CycleCancelledError("Registry request aborted");
    }

    const now = this.clock();
    const previousSlotAt = this.nextSlotAt;
    const slot = Math.max(now, this.nextSlotAt);
    const reservedUntil = slot + this.minIntervalMs;
    this.nextSlotAt = reservedUntil;

    const waitMs = slot - now;
    if (waitMs > 0) {
      try {
        await this.waitOrAbort(waitMs, signal);
      } catch (error) {
        if (this.nextSlotAt === reservedUntil) {
          this.nextSlotAt = previousSlotAt;
        }
        throw error;
      }
    }
    return waitMs;
  }

  /** Milliseconds until the next free slot (for monitoring) */
  getPendingDelay(): number {
    return Math.max(0, this.nextSlotAt - this.clock());
  }

  private async waitOrAbort(ms: number, signal?: AbortSignal): Promise<void> {
    if (!signal) {
      await this.sleep(ms);
      return;
    }

    let rejectWait: (error: Error) => void = () => undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectWait = reject;
    });
    const onAbort = () => rejectWait(new CycleCancelledError("Registry request aborted"));
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      await Promise.race([this.sleep(ms), aborted]);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
