/**
 * Publication Factory
 *
 * Builds the immutable Publication value from a raw page record:
 * normalizes the case number, resolves the publication date and
 * stamps the identity hash.
 */
import { REGISTRY } from "../config/constants";
import { ParsingError } from "../shared/errors/scrape.errors";
import type { RawPublicationRecord } from "../shared/types/scrape-result.types";
import type { Publication } from "../shared/types/search.types";
import { normalizeCaseNumber } from "../shared/utils/case-number";
import { parsePublicationDate } from "../shared/utils/date";
import { logger } from "../monitoring/logger";
import { computeIdentity } from "./identity";

/**
 * @param raw - Record read from the results page
 * @param now - Fallback instant when the date cannot be resolved
 * @throws ParsingError when the record has no case number
 */
export function buildPublication(raw: RawPublicationRecord, now: Date): Publication {
  const rawCaseNumber = raw.caseNumber.trim();
  if (rawCaseNumber === "" || rawCaseNumber === REGISTRY.MISSING_FIELD) {
    throw new ParsingError("Publication record has no case number");
  }

  const caseNumber = normalizeCaseNumber(rawCaseNumber);

  let publishedAt = parsePublicationDate(raw.publishedAtText);
  if (!publishedAt) {
    logger.warn(
      { caseNumber, publishedAtText: raw.publishedAtText },
      "Unparseable publication date, using current time"
    );
    // The fallback enters the identity hash, so such a record gets a new
    // identity on every cycle and is not deduplicated
    publishedAt = new Date(now.getTime());
  }

  const court = raw.court.trim() || REGISTRY.MISSING_FIELD;

  const publication: Publication = {
    identityHash: computeIdentity({ caseNumber, publishedAt, court }),
    caseNumber,
    publishedAt,
    court,
    content: raw.content.trim() || REGISTRY.MISSING_FIELD,
    tribunalName: raw.tribunalName.trim() || REGISTRY.MISSING_FIELD,
    ...(raw.notebook ? { notebook: raw.notebook } : {}),
    ...(raw.sourceUrl ? { sourceUrl: raw.sourceUrl } : {}),
  };

  return Object.freeze(publication);
}
