/**
 * String cleaning
 *
 * @module normalization/strings
 */

/**
 * Trimmed value, or null for absent and whitespace-only input
 */
export function trimToNull(raw: string | null | undefined): string | null {
  if (raw === undefined || raw === null) {
    return null;
  }
  const trimmed = raw.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Trim, map empty to null, and truncate to maxLength when given.
 * Truncation is silent.
 */
export function cleanString(raw: string | null | undefined, maxLength?: number): string | null {
  const trimmed = trimToNull(raw);
  if (trimmed !== null && maxLength !== undefined && trimmed.length > maxLength) {
    return trimmed.slice(0, maxLength);
  }
  return trimmed;
}
