/**
 * Content Hashing Utilities
 *
 * Identity hashes are the deduplication key for ingested publications:
 * equal inputs must always produce equal digests.
 */
import crypto from "crypto";

/**
 * Computes a SHA-256 hash of an arbitrary string.
 *
 * @returns 64-character hex string
 */
export function hashString(value: string): string {
  return crypto.createHash("sha256").update(value, "utf8").digest("hex");
}

/**
 * Hashes several parts joined with "|" so that ("ab", "c") and
 * ("a", "bc") never collide.
 */
export function hashParts(parts: readonly string[]): string {
  return hashString(parts.join("|"));
}
