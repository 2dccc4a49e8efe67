/**
 * Publication Summarizer
 *
 * First few sentences of the text, capped in length.
 */
import { SUMMARY } from "../config/constants";

export function summarize(content: string | null | undefined): string {
  const sentences = (content ?? "")
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);

  if (sentences.length === 0) {
    return SUMMARY.EMPTY;
  }

  const summary = sentences.slice(0, SUMMARY.MAX_SENTENCES).join(". ");
  if (summary.length > SUMMARY.MAX_LENGTH) {
    return `${summary.slice(0, SUMMARY.MAX_LENGTH - 3)}...`;
  }
  return summary;
}
