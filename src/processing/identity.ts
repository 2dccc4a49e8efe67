/**
 * Publication Identity
 *
 * The identity hash is the idempotence key of the whole pipeline: the
 * monitor skips any publication whose hash is already stored, and the
 * store enforces it with a unique index.
 */
import { hashParts } from "../shared/utils/hash";
import { normalizeCaseNumber } from "../shared/utils/case-number";

export interface IdentityInput {
  caseNumber: string;
  publishedAt: Date;
  /** Deciding/issuing body */
  court: string;
}

/**
 * SHA-256 over normalized case number, ISO publication instant and court.
 */
export function computeIdentity(input: IdentityInput): string {
  return hashParts([
    normalizeCaseNumber(input.caseNumber),
    input.publishedAt.toISOString(),
    input.court,
  ]);
}
