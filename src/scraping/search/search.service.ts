/**
 * Search Service
 *
 * Entry point for publication searches by attorney bar number.
 * Validates input, then lets the pagination aggregator drive page
 * fetches through the fetch client and result parser.
 *
 * Failures past validation never throw: they come back in
 * SearchResult.error with no publications.
 */
import config from "../../config";
import { toError } from "../../shared/errors/scrape.errors";
import type { SearchOptions, SearchQuery, SearchResult } from "../../shared/types/search.types";
import { subtractDays } from "../../shared/utils/date";
import { logger } from "../../monitoring/logger";
import { FetchClient } from "../http/fetch-client";
import { emptySearchResult, parseSearchResponse } from "../parsers/result.parser";
import { fetchAllPages, fetchAllPagesConcurrently } from "./pagination.aggregator";
import { validateDays, validateSearchQuery } from "./query.validator";
import { buildRequestParams } from "./request-params";

export interface SearchServiceOptions {
  fetchClient?: FetchClient;
  /** Registry search endpoint */
  baseUrl?: string;
  /** Max pages in flight in concurrent mode */
  pageConcurrency?: number;
  pageSize?: number;
  clock?: () => Date;
}

export class SearchService {
  private readonly fetchClient: FetchClient;
  private readonly baseUrl: string;
  private readonly pageConcurrency: number;
  private readonly pageSize: number;
  private readonly clock: () => Date;

  constructor(options: SearchServiceOptions = {}) {
    this.fetchClient = options.fetchClient ?? new FetchClient();
    this.baseUrl = options.baseUrl ?? config.registryBaseUrl;
    this.pageConcurrency = options.pageConcurrency ?? config.pageConcurrency;
    this.pageSize = options.pageSize ?? config.pageSize;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * All publications for a bar registration within an optional date range.
   *
   * @throws ValidationError before any request when the input is invalid
   */
  async searchByPeriod(
    barNumber: string,
    stateCode: string,
    startDate?: Date,
    endDate?: Date,
    options: SearchOptions = {}
  ): Promise<SearchResult> {
    const query = validateSearchQuery({
      barNumber,
      stateCode,
      startDate,
      endDate,
      page: 1,
      pageSize: this.pageSize,
    });
    const mode = options.mode ?? "concurrent";
    const startedAt = Date.now();

    logger.info(
      {
        barNumber: query.barNumber,
        stateCode: query.stateCode,
        startDate: query.startDate?.toISOString(),
        endDate: query.endDate?.toISOString(),
        mode,
      },
      "Searching publications"
    );

    const fetchPage = (pageQuery: SearchQuery) => this.searchPage(pageQuery, options);
    const result =
      mode === "sequential"
        ? await fetchAllPages(query, fetchPage)
        : await fetchAllPagesConcurrently(query, fetchPage, this.pageConcurrency);

    logger.info(
      {
        barNumber: query.barNumber,
        stateCode: query.stateCode,
        totalFound: result.totalFound,
        totalPages: result.totalPages,
        error: result.error,
        durationMs: Date.now() - startedAt,
      },
      result.error ? "Search finished with error" : "Search completed"
    );

    return result;
  }

  /**
   * Publications of the last `days` days, ending now.
   *
   * @throws ValidationError before any request when the input is invalid
   */
  async searchLastDays(
    barNumber: string,
    stateCode: string,
    days: number,
    options: SearchOptions = {}
  ): Promise<SearchResult> {
    const window = validateDays(days);
    const endDate = this.clock();
    return this.searchByPeriod(barNumber, stateCode, subtractDays(endDate, window), endDate, options);
  }

  /**
   * One results page. Any fetch or parse failure lands in `error`.
   */
  async searchPage(query: SearchQuery, options: SearchOptions = {}): Promise<SearchResult> {
    const fetchedAt = this.clock();

    try {
      const body = await this.fetchClient.fetchOrThrow(this.baseUrl, buildRequestParams(query), {
        signal: options.signal,
      });
      return parseSearchResponse(body, query, { now: fetchedAt, baseUrl: this.baseUrl });
    } catch (error) {
      const message = toError(error).message;
      logger.error(
        { barNumber: query.barNumber, stateCode: query.stateCode, page: query.page, error: message },
        "Results page fetch failed"
      );
      return emptySearchResult(query, fetchedAt, message);
    }
  }
}
