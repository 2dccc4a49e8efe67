/**
 * Search Types
 *
 * Shapes exchanged between the fetch client, parser, aggregator
 * and search façade.
 */
import { STATE_CODES } from "../../config/constants";
import type { ScrapeError } from "../errors/scrape.errors";

export type StateCode = (typeof STATE_CODES)[number];

/**
 * One page request against the registry.
 * Produced only by the query validator, so stateCode is already normalized.
 */
export interface SearchQuery {
  /** Attorney bar registration number (OAB) */
  barNumber: string;
  /** Upper-case state code the registration belongs to */
  stateCode: StateCode;
  startDate?: Date;
  endDate?: Date;
  /** 1-based page number */
  page: number;
  pageSize: number;
}

/**
 * A single gazette entry. Built by the publication factory right after a
 * page parse and frozen; never mutated afterwards.
 */
export interface Publication {
  /** Deduplication key over (caseNumber, publishedAt, court) */
  readonly identityHash: string;
  /** CNJ-formatted when the raw value has exactly 20 digits */
  readonly caseNumber: string;
  readonly publishedAt: Date;
  /** Deciding/issuing body (órgão julgador) */
  readonly court: string;
  /** Rendered publication text */
  readonly content: string;
  readonly tribunalName: string;
  /** Gazette notebook (caderno), when listed */
  readonly notebook?: string;
  readonly sourceUrl?: string;
}

export interface SearchResult {
  publications: Publication[];
  totalFound: number;
  currentPage: number;
  totalPages: number;
  query: SearchQuery;
  fetchedAt: Date;
  /** Set when the search failed; publications is then empty */
  error: string | null;
}

export type SearchMode = "sequential" | "concurrent";

export interface SearchOptions {
  /** "concurrent" fetches pages 2..N in parallel (default) */
  mode?: SearchMode;
  /** Aborts in-flight requests */
  signal?: AbortSignal;
}

/** Query-string parameters sent to the registry */
export type RequestParams = Record<string, string>;

/**
 * Outcome of a single HTTP attempt.
 * Callers branch on `kind` instead of catching by error class.
 */
export type AttemptOutcome =
  | { kind: "ok"; body: string; statusCode: number }
  | { kind: "retryable"; error: ScrapeError }
  | { kind: "terminal"; error: ScrapeError };

/** Outcome of a fetch after the retry budget is applied */
export type FetchResult =
  | { ok: true; body: string; statusCode: number; attempts: number }
  | { ok: false; error: ScrapeError; attempts: number };
