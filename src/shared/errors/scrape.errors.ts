/**
 * Custom Error Classes for Search and Monitor Operations
 *
 * Each error class maps to an ERROR_CODE in constants.ts.
 * The fetch client, parser and monitor use these to classify failures
 * for retry decisions and MONITOR_LOG entries.
 */
import { ERROR_CODES } from "../../config/constants";

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for all search/monitor errors.
 * Includes an error code for classification in monitor logs.
 */
export class ScrapeError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, retryable: boolean = true) {
    super(message);
    this.name = "ScrapeError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Registry unreachable, timed out or answered 5xx/429 */
export class NetworkError extends ScrapeError {
  /** Number of attempts made before giving up */
  public readonly attempts: number;
  public readonly statusCode?: number;

  constructor(message: string = "Registry unreachable", attempts: number = 1, statusCode?: number) {
    super(message, ERROR_CODES.NETWORK_ERROR, true);
    this.name = "NetworkError";
    this.attempts = attempts;
    this.statusCode = statusCode;
  }

  /** Same failure, re-labelled with the final attempt count */
  withAttempts(attempts: number): NetworkError {
    return new NetworkError(this.message, attempts, this.statusCode);
  }
}

/** Registry answered with a bot-challenge page */
export class CaptchaDetectedError extends ScrapeError {
  constructor(message: string = "Captcha detected on registry response") {
    super(message, ERROR_CODES.CAPTCHA_DETECTED, false);
    this.name = "CaptchaDetectedError";
  }
}

/** HTTP 404 or a not-found page */
export class NotFoundError extends ScrapeError {
  constructor(message: string = "Registry page not found (404)") {
    super(message, ERROR_CODES.NOT_FOUND, false);
    this.name = "NotFoundError";
  }
}

/** Any other 4xx answer; retrying the same request cannot help */
export class RequestRejectedError extends ScrapeError {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string = `Registry rejected the request (HTTP ${statusCode})`) {
    super(message, ERROR_CODES.REQUEST_REJECTED, false);
    this.name = "RequestRejectedError";
    this.statusCode = statusCode;
  }
}

/** Search input rejected before any network call */
export class ValidationError extends ScrapeError {
  public readonly details: string[];

  constructor(message: string = "Invalid search query", details: string[] = []) {
    super(message, ERROR_CODES.VALIDATION_FAILED, false);
    this.name = "ValidationError";
    this.details = details;
  }
}

/** A single result record could not be built; the page continues */
export class ParsingError extends ScrapeError {
  constructor(message: string = "Could not parse publication record") {
    super(message, ERROR_CODES.PARSING_FAILED, false);
    this.name = "ParsingError";
  }
}

/** In-flight work aborted from outside (e.g. subscription deactivated) */
export class CycleCancelledError extends ScrapeError {
  constructor(message: string = "Monitor cycle cancelled") {
    super(message, ERROR_CODES.CYCLE_CANCELLED, false);
    this.name = "CycleCancelledError";
  }
}

/** Search finished with SearchResult.error set */
export class SearchFailedError extends ScrapeError {
  constructor(message: string) {
    super(message, ERROR_CODES.SEARCH_FAILED, true);
    this.name = "SearchFailedError";
  }
}

/** Normalize anything thrown into an Error for logging */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
