/**
 * Result Parser
 *
 * Reads one registry results page into a SearchResult.
 *
 * Every field has a primary selector and a fallback (see REGISTRY.SELECTORS),
 * since the registry markup has changed shape before. A record that cannot
 * be built is logged and dropped; the rest of the page is kept.
 *
 * Never throws: a page that cannot be processed at all yields an empty
 * result with `error` set.
 */
import * as cheerio from "cheerio";
import { REGISTRY } from "../../config/constants";
import { toError } from "../../shared/errors/scrape.errors";
import type { PaginationInfo, RawPublicationRecord } from "../../shared/types/scrape-result.types";
import type { Publication, SearchQuery, SearchResult } from "../../shared/types/search.types";
import { buildPublication } from "../../processing/publication.factory";
import { logger } from "../../monitoring/logger";

export interface ParseOptions {
  /** Fetch instant; also the fallback for unparseable dates */
  now?: Date;
  /** Base for resolving relative source links */
  baseUrl?: string;
}

export function parseSearchResponse(
  body: string,
  query: SearchQuery,
  options: ParseOptions = {}
): SearchResult {
  const now = options.now ?? new Date();

  try {
    const $ = cheerio.load(body);
    const publications = extractPublications($, now, options.baseUrl);
    const pagination = extractPagination($, query, publications.length);

    logger.debug(
      {
        barNumber: query.barNumber,
        stateCode: query.stateCode,
        page: query.page,
        records: publications.length,
        totalFound: pagination.totalFound,
      },
      "Parsed results page"
    );

    return {
      publications,
      ...pagination,
      query,
      fetchedAt: now,
      error: null,
    };
  } catch (error) {
    const message = toError(error).message;
    logger.error({ page: query.page, error: message }, "Failed to process results page");
    return emptySearchResult(query, now, `Failed to process results page: ${message}`);
  }
}

/** Result carrying no publications, optionally with an error */
export function emptySearchResult(
  query: SearchQuery,
  fetchedAt: Date,
  error: string | null
): SearchResult {
  return {
    publications: [],
    totalFound: 0,
    currentPage: query.page,
    totalPages: 0,
    query,
    fetchedAt,
    error,
  };
}

function extractPublications(
  $: cheerio.CheerioAPI,
  now: Date,
  baseUrl?: string
): Publication[] {
  const publications: Publication[] = [];
  const elements = selectWithFallback($, REGISTRY.SELECTORS.RECORDS).toArray();

  elements.forEach((element, index) => {
    // Each record gets its own document so the field selectors stay local
    const $record = cheerio.load($.html(element), null, false);
    try {
      publications.push(buildPublication(extractRecord($record, baseUrl), now));
    } catch (error) {
      logger.warn(
        { index, error: toError(error).message },
        "Dropping publication record that could not be parsed"
      );
    }
  });

  return publications;
}

function extractRecord($record: cheerio.CheerioAPI, baseUrl?: string): RawPublicationRecord {
  const { SELECTORS, MISSING_FIELD } = REGISTRY;
  const notebook = readText($record, SELECTORS.NOTEBOOK);
  const sourceUrl = readSourceUrl($record, baseUrl);

  return {
    caseNumber: readText($record, SELECTORS.CASE_NUMBER),
    publishedAtText: readText($record, SELECTORS.PUBLISHED_AT),
    court: readText($record, SELECTORS.COURT) || MISSING_FIELD,
    content: readText($record, SELECTORS.CONTENT) || MISSING_FIELD,
    tribunalName: readText($record, SELECTORS.TRIBUNAL) || MISSING_FIELD,
    ...(notebook ? { notebook } : {}),
    ...(sourceUrl ? { sourceUrl } : {}),
  };
}

/**
 * Pagination block: "de N resultados" plus the active page marker.
 * Without one, the page is taken to be the whole result set.
 */
function extractPagination(
  $: cheerio.CheerioAPI,
  query: SearchQuery,
  recordCount: number
): PaginationInfo {
  const container = selectWithFallback($, REGISTRY.SELECTORS.PAGINATION);
  if (container.length === 0) {
    return {
      totalFound: recordCount,
      currentPage: query.page,
      totalPages: Math.ceil(recordCount / query.pageSize),
    };
  }

  const totalMatch = REGISTRY.TOTAL_PATTERN.exec(collapse(container.text()));
  const totalFound = totalMatch ? parseInt(totalMatch[1].replace(/\./g, ""), 10) : recordCount;

  const activeText = collapse(container.find(REGISTRY.SELECTORS.CURRENT_PAGE[0]).first().text()) ||
    collapse(container.find(REGISTRY.SELECTORS.CURRENT_PAGE[1]).first().text());
  const activePage = parseInt(activeText, 10);

  return {
    totalFound,
    currentPage: isNaN(activePage) ? query.page : activePage,
    totalPages: Math.ceil(totalFound / query.pageSize),
  };
}

/** Matches of the first selector that finds anything */
function selectWithFallback($: cheerio.CheerioAPI, selectors: readonly string[]) {
  for (const selector of selectors) {
    const found = $(selector);
    if (found.length > 0) return found;
  }
  return $(selectors[0]);
}

function readText($: cheerio.CheerioAPI, selectors: readonly string[]): string {
  return collapse(selectWithFallback($, selectors).first().text());
}

function readSourceUrl($: cheerio.CheerioAPI, baseUrl?: string): string | undefined {
  const href = selectWithFallback($, REGISTRY.SELECTORS.SOURCE_LINK).first().attr("href")?.trim();
  if (!href) return undefined;
  if (!baseUrl) return href;

  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
