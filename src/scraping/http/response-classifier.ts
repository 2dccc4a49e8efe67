/**
 * Response Classifier
 *
 * Turns one HTTP answer (or transport failure) into a tagged
 * AttemptOutcome. Content markers are matched case-insensitively.
 */
import { AxiosError, isAxiosError, isCancel } from "axios";
import { CONTENT_MARKERS } from "../../config/constants";
import {
  CaptchaDetectedError,
  CycleCancelledError,
  NetworkError,
  NotFoundError,
  RequestRejectedError,
} from "../../shared/errors/scrape.errors";
import type { AttemptOutcome } from "../../shared/types/search.types";

export function containsMarker(body: string, markers: readonly string[]): boolean {
  const lower = body.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}

export function looksLikeCaptcha(body: string): boolean {
  return containsMarker(body, CONTENT_MARKERS.CAPTCHA);
}

export function looksLikeNotFound(body: string): boolean {
  return containsMarker(body, CONTENT_MARKERS.NOT_FOUND);
}

/**
 * Classify a completed HTTP exchange.
 *
 * Order: 404 status, captcha page, not-found page, 5xx/429 (retryable),
 * other 4xx (terminal), success.
 */
export function classifyResponse(statusCode: number, body: string): AttemptOutcome {
  if (statusCode === 404) {
    return { kind: "terminal", error: new NotFoundError() };
  }

  if (looksLikeCaptcha(body)) {
    return { kind: "terminal", error: new CaptchaDetectedError() };
  }

  if (looksLikeNotFound(body)) {
    return { kind: "terminal", error: new NotFoundError("Registry returned a not-found page") };
  }

  if (statusCode >= 500 || statusCode === 429) {
    return {
      kind: "retryable",
      error: new NetworkError(`Registry answered HTTP ${statusCode}`, 1, statusCode),
    };
  }

  if (statusCode >= 400) {
    return { kind: "terminal", error: new RequestRejectedError(statusCode) };
  }

  return { kind: "ok", body, statusCode };
}

/**
 * Classify a thrown transport error. Anything that is not a cancellation
 * (DNS, reset, timeout, proxy failure) is retryable.
 */
export function classifyTransportError(error: unknown, signal?: AbortSignal): AttemptOutcome {
  if (signal?.aborted || isCancel(error)) {
    return { kind: "terminal", error: new CycleCancelledError("Registry request aborted") };
  }

  if (isAxiosError(error)) {
    return { kind: "retryable", error: new NetworkError(describeAxiosError(error)) };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: "retryable", error: new NetworkError(message) };
}

function describeAxiosError(error: AxiosError): string {
  if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
    return `Registry request timed out: ${error.message}`;
  }
  return `Error connecting to registry: ${error.code ? `${error.code} ` : ""}${error.message}`;
}
