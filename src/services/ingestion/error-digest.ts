/**
 * Bounded failure digest stored in ProcessingRun.error_summary
 *
 * @module ingestion/error-digest
 */

export interface DigestOptions {
  /** Reasons kept verbatim */
  limit: number;
  /** Maximum characters of the whole digest */
  maxLength: number;
}

export const DEFAULT_DIGEST_OPTIONS: DigestOptions = { limit: 10, maxLength: 2000 };

const ELLIPSIS = '...';

/**
 * First `limit` reasons joined by '; ', cut to maxLength, with
 * " (+K more)" when reasons were dropped.
 *
 * @param totalCount - failures seen, which may exceed reasons.length
 * @returns null when nothing failed
 */
export function buildErrorDigest(
  reasons: readonly string[],
  totalCount: number = reasons.length,
  options: DigestOptions = DEFAULT_DIGEST_OPTIONS
): string | null {
  if (reasons.length === 0 || totalCount === 0) {
    return null;
  }

  const kept = reasons.slice(0, options.limit);
  const dropped = Math.max(0, totalCount - kept.length);
  const suffix = dropped > 0 ? ` (+${dropped} more)` : '';

  let body = kept.join('; ');
  const room = options.maxLength - suffix.length;
  if (body.length > room) {
    body = body.slice(0, Math.max(0, room - ELLIPSIS.length)) + ELLIPSIS;
  }
  return body + suffix;
}
