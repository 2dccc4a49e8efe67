/**
 * Pagination Aggregator
 *
 * Drives the page fetches of one search: page 1 first, then pages
 * 2..totalPages either one by one or fanned out under a concurrency cap.
 *
 * A failed sub-page is logged and contributes nothing; the merged result
 * keeps page 1's metadata with totalFound recounted from what was merged.
 */
import pLimit from "p-limit";
import config from "../../config";
import { toError } from "../../shared/errors/scrape.errors";
import type { SearchQuery, SearchResult } from "../../shared/types/search.types";
import { logger } from "../../monitoring/logger";
import { emptySearchResult } from "../parsers/result.parser";

/** Fetches and parses one page; expected to report failures in `error` */
export type PageFetcher = (query: SearchQuery) => Promise<SearchResult>;

export async function fetchAllPages(
  query: SearchQuery,
  fetchPage: PageFetcher
): Promise<SearchResult> {
  const first = await safeFetch(fetchPage, { ...query, page: 1 });
  if (first.error !== null || first.totalPages <= 1) {
    return first;
  }

  const pages: SearchResult[] = [];
  for (const pageQuery of remainingPages(first)) {
    pages.push(await safeFetch(fetchPage, pageQuery));
  }

  return merge(first, pages);
}

export async function fetchAllPagesConcurrently(
  query: SearchQuery,
  fetchPage: PageFetcher,
  concurrency: number = config.pageConcurrency
): Promise<SearchResult> {
  const first = await safeFetch(fetchPage, { ...query, page: 1 });
  if (first.error !== null || first.totalPages <= 1) {
    return first;
  }

  const limit = pLimit(Math.max(1, concurrency));
  const pages = await Promise.all(
    remainingPages(first).map((pageQuery) => limit(() => safeFetch(fetchPage, pageQuery)))
  );

  return merge(first, pages);
}

function remainingPages(first: SearchResult): SearchQuery[] {
  const queries: SearchQuery[] = [];
  for (let page = 2; page <= first.totalPages; page++) {
    queries.push({ ...first.query, page });
  }
  return queries;
}

/** Page order is preserved */
function merge(first: SearchResult, pages: SearchResult[]): SearchResult {
  const publications = [...first.publications];
  let failedPages = 0;

  for (const page of pages) {
    if (page.error !== null) {
      failedPages++;
      logger.warn(
        { page: page.query.page, totalPages: first.totalPages, error: page.error },
        "Skipping results page that failed"
      );
      continue;
    }
    publications.push(...page.publications);
  }

  logger.info(
    {
      barNumber: first.query.barNumber,
      stateCode: first.query.stateCode,
      totalPages: first.totalPages,
      failedPages,
      publications: publications.length,
    },
    "Merged results pages"
  );

  return {
    ...first,
    publications,
    totalFound: publications.length,
  };
}

async function safeFetch(fetchPage: PageFetcher, query: SearchQuery): Promise<SearchResult> {
  try {
    return await fetchPage(query);
  } catch (error) {
    return emptySearchResult(query, new Date(), toError(error).message);
  }
}
