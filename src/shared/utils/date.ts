/**
 * Timezone-Aware Date Utilities
 *
 * Gazette dates carry no timezone; they are read as Brazilian
 * civil dates (America/Sao_Paulo). Scheduling math uses plain
 * epoch milliseconds.
 */
import moment from "moment-timezone";
import { REGISTRY } from "../../config/constants";

const TIMEZONE = "America/Sao_Paulo";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Format a date the way the registry expects range parameters (DD/MM/YYYY) */
export function formatRegistryDate(date: Date): string {
  return moment(date).tz(TIMEZONE).format(REGISTRY.PARAM_DATE_FORMAT);
}

/** Format a date for display (DD/MM/YYYY HH:mm) */
export function formatDateTime(date: Date): string {
  return moment(date).tz(TIMEZONE).format("DD/MM/YYYY HH:mm");
}

/**
 * Parse a publication date as printed on the results page.
 *
 * Tries the accepted formats strictly, then looks for a DD/MM/YYYY or
 * DD-MM-YYYY shaped substring anywhere in the text.
 * Returns null when nothing resolves; the caller decides the fallback.
 */
export function parsePublicationDate(text: string | null | undefined): Date | null {
  if (!text) return null;
  const trimmed = text.trim();
  if (trimmed === "") return null;

  for (const format of REGISTRY.DATE_FORMATS) {
    const parsed = moment.tz(trimmed, format, true, TIMEZONE);
    if (parsed.isValid()) {
      return parsed.toDate();
    }
  }

  const match = trimmed.match(/(\d{2})[/-](\d{2})[/-](\d{4})/);
  if (match) {
    const [, day, month, year] = match;
    const parsed = moment.tz(`${day}/${month}/${year}`, "DD/MM/YYYY", true, TIMEZONE);
    if (parsed.isValid()) {
      return parsed.toDate();
    }
  }

  return null;
}

/** Shift a date back by whole days */
export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

export function hoursToMs(hours: number): number {
  return hours * HOUR_MS;
}
