/**
 * Fetch Client
 *
 * Rate-limited, retried GET against the publication registry.
 *
 * Flow per request:
 * 1. Wait for a rate limiter slot
 * 2. Issue the GET (per-request timeout, optional proxy, abort signal)
 * 3. Classify the answer: ok / retryable / terminal
 * 4. Retry retryable outcomes with exponential backoff until the
 *    attempt budget is spent
 *
 * Captcha and not-found answers are never retried. No caching.
 */
import axios, { type AxiosInstance, type AxiosProxyConfig } from "axios";
import config from "../../config";
import { REGISTRY } from "../../config/constants";
import { CycleCancelledError, NetworkError, ScrapeError } from "../../shared/errors/scrape.errors";
import type { AttemptOutcome, FetchResult, RequestParams } from "../../shared/types/search.types";
import { type BackoffPolicy, backoffDelay, sleep as defaultSleep } from "../../shared/utils/retry";
import { logger } from "../../monitoring/logger";
import { metrics } from "../../monitoring/metrics.collector";
import { RateLimiter } from "./rate-limiter";
import { classifyResponse, classifyTransportError } from "./response-classifier";

export interface FetchClientOptions {
  /** Total attempts per request, including the first (default: 3) */
  maxAttempts?: number;
  backoff?: BackoffPolicy;
  timeoutMs?: number;
  /** Minimum interval between two request starts */
  minIntervalMs?: number;
  /** http(s)://user:pass@host:port */
  proxyUrl?: string;
  headers?: Record<string, string>;
  /** Pre-configured axios instance (tests inject an adapter here) */
  http?: AxiosInstance;
  rateLimiter?: RateLimiter;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchRequestOptions {
  signal?: AbortSignal;
}

export class FetchClient {
  private readonly http: AxiosInstance;
  private readonly rateLimiter: RateLimiter;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: FetchClientOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? config.fetchMaxAttempts);
    this.backoff = options.backoff ?? {
      baseDelayMs: config.fetchBackoffBaseMs,
      multiplier: 2,
      maxDelayMs: config.fetchBackoffMaxMs,
    };
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
    this.headers = { ...REGISTRY.HEADERS, ...(options.headers ?? {}) };
    this.rateLimiter =
      options.rateLimiter ?? new RateLimiter(options.minIntervalMs ?? config.rateLimitIntervalMs);
    this.sleep = options.sleep ?? defaultSleep;

    const proxyUrl = options.proxyUrl ?? config.httpProxyUrl;
    this.http =
      options.http ??
      axios.create({
        maxRedirects: 5,
        proxy: proxyUrl ? parseProxyUrl(proxyUrl) : undefined,
      });
  }

  /**
   * Fetch a URL and return the body, or the error that ended the attempts.
   * Never throws.
   */
  async fetch(
    url: string,
    params: RequestParams,
    options: FetchRequestOptions = {}
  ): Promise<FetchResult> {
    let lastError: ScrapeError = new NetworkError("No attempt made", 0);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const outcome = await this.attemptOnce(url, params, options.signal);
      metrics.increment("registry_requests_total", { outcome: outcome.kind });

      if (outcome.kind === "ok") {
        return { ok: true, body: outcome.body, statusCode: outcome.statusCode, attempts: attempt };
      }

      if (outcome.kind === "terminal") {
        logger.warn(
          { url, attempt, errorCode: outcome.error.code, error: outcome.error.message },
          "Registry request failed, not retrying"
        );
        return { ok: false, error: outcome.error, attempts: attempt };
      }

      lastError =
        outcome.error instanceof NetworkError ? outcome.error.withAttempts(attempt) : outcome.error;

      if (attempt === this.maxAttempts) {
        logger.error(
          { url, attempt, maxAttempts: this.maxAttempts, error: lastError.message },
          `Registry request failed after ${this.maxAttempts} attempts`
        );
        break;
      }

      const delay = backoffDelay(attempt, this.backoff);
      logger.warn(
        { url, attempt, maxAttempts: this.maxAttempts, delay, error: lastError.message },
        `Registry request attempt ${attempt} failed, retrying in ${delay}ms`
      );
      await this.sleep(delay);
    }

    return { ok: false, error: lastError, attempts: this.maxAttempts };
  }

  /**
   * Same as fetch(), but throws the final error.
   */
  async fetchOrThrow(
    url: string,
    params: RequestParams,
    options: FetchRequestOptions = {}
  ): Promise<string> {
    const result = await this.fetch(url, params, options);
    if (!result.ok) {
      throw result.error;
    }
    return result.body;
  }

  /** Single attempt (no retries). */
  private async attemptOnce(
    url: string,
    params: RequestParams,
    signal?: AbortSignal
  ): Promise<AttemptOutcome> {
    if (signal?.aborted) {
      return { kind: "terminal", error: new CycleCancelledError("Registry request aborted") };
    }

    try {
      await this.rateLimiter.acquire(signal);
    } catch (error) {
      // Aborted while waiting for a slot
      return classifyTransportError(error, signal);
    }

    try {
      const response = await this.http.get<unknown>(url, {
        params,
        headers: this.headers,
        timeout: this.timeoutMs,
        responseType: "text",
        // Status codes are classified below, not thrown
        validateStatus: () => true,
        signal,
      });

      const body =
        typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? "");
      return classifyResponse(response.status, body);
    } catch (error) {
      return classifyTransportError(error, signal);
    }
  }
}

/**
 * Convert a proxy URL into axios' proxy option.
 */
export function parseProxyUrl(proxyUrl: string): AxiosProxyConfig {
  const parsed = new URL(proxyUrl);
  const protocol = parsed.protocol.replace(":", "");
  const port = parsed.port ? parseInt(parsed.port, 10) : protocol === "https" ? 443 : 80;

  const proxy: AxiosProxyConfig = { protocol, host: parsed.hostname, port };
  if (parsed.username) {
    proxy.auth = {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
  return proxy;
}
