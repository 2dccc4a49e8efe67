/**
 * CNJ case-number normalization.
 *
 * The national format is NNNNNNN-DD.AAAA.J.TR.OOOO (20 digits).
 * Values that do not reduce to exactly 20 digits are returned unchanged.
 */
export function normalizeCaseNumber(raw: string): string {
  const digits = raw.replace(/\D/g, "");
  if (digits.length !== 20) return raw;

  return (
    `${digits.slice(0, 7)}-${digits.slice(7, 9)}.${digits.slice(9, 13)}.` +
    `${digits.slice(13, 14)}.${digits.slice(14, 16)}.${digits.slice(16, 20)}`
  );
}
