/**
 * Scrape Result Types
 *
 * Raw data as read from one results page, before normalization
 * into immutable Publication values.
 */

/**
 * A single record as printed on the results page.
 * All fields are trimmed text; dates are still unparsed.
 */
export interface RawPublicationRecord {
  caseNumber: string;
  publishedAtText: string;
  court: string;
  content: string;
  tribunalName: string;
  notebook?: string;
  sourceUrl?: string;
}

/** Pagination metadata read from the page */
export interface PaginationInfo {
  totalFound: number;
  currentPage: number;
  totalPages: number;
}
