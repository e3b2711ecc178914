/**
 * Closed enumeration mapping
 *
 * Raw labels are folded to a lookup key (uppercase, '-', '.' and spaces to
 * '_', surrounding '_' trimmed) and looked up in a per-family synonym table.
 *
 * @module normalization/enums
 */

import type { InspectionResult, NcrSeverity, NcrStatus } from '../../models/records.js';
import { NormalizationError } from './errors.js';
import { trimToNull } from './strings.js';

function synonymTable<T extends string>(
  groups: ReadonlyArray<readonly [T, readonly string[]]>
): ReadonlyMap<string, T> {
  const table = new Map<string, T>();
  for (const [canonical, synonyms] of groups) {
    table.set(canonical, canonical);
    for (const synonym of synonyms) {
      table.set(synonym, canonical);
    }
  }
  return table;
}

export const INSPECTION_RESULT_SYNONYMS = synonymTable<InspectionResult>([
  ['PASS', ['PASSED', 'OK', 'GOOD', 'ACCEPT', 'ACCEPTED']],
  ['FAIL', ['FAILED', 'REJECT', 'REJECTED', 'NOK', 'NG']],
  ['CONDITIONAL', ['COND', 'PARTIAL', 'CONDITIONAL_PASS']],
]);

export const NCR_STATUS_SYNONYMS = synonymTable<NcrStatus>([
  ['OPEN', ['OPENED', 'NEW']],
  ['IN_REVIEW', ['REVIEW', 'REVIEWING', 'UNDER_REVIEW']],
  ['CLOSED', ['CLOSE', 'RESOLVED']],
  ['CANCELLED', ['CANCELED', 'CANCEL']],
]);

export const NCR_SEVERITY_SYNONYMS = synonymTable<NcrSeverity>([
  ['LOW', ['L', 'MINOR']],
  ['MEDIUM', ['MED', 'M', 'MODERATE']],
  ['HIGH', ['H', 'MAJOR']],
  ['CRITICAL', ['CRIT', 'C', 'SEVERE']],
]);

export interface EnumFamilies {
  inspection_result: InspectionResult;
  ncr_status: NcrStatus;
  ncr_severity: NcrSeverity;
}

export type EnumFamily = keyof EnumFamilies;

const FAMILY_TABLES: { [F in EnumFamily]: ReadonlyMap<string, EnumFamilies[F]> } = {
  inspection_result: INSPECTION_RESULT_SYNONYMS,
  ncr_status: NCR_STATUS_SYNONYMS,
  ncr_severity: NCR_SEVERITY_SYNONYMS,
};

export function enumLookupKey(raw: string): string {
  return raw
    .trim()
    .toUpperCase()
    .replace(/[-.\s]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Map a raw label onto a closed enumeration.
 *
 * @returns null for blank input
 * @throws NormalizationError UNKNOWN_ENUM_VALUE naming the family and raw value
 */
export function normalizeEnum<F extends EnumFamily>(
  raw: string | null | undefined,
  family: F
): EnumFamilies[F] | null {
  const value = trimToNull(raw);
  if (value === null) {
    return null;
  }
  const table: ReadonlyMap<string, EnumFamilies[F]> = FAMILY_TABLES[family];
  const mapped = table.get(enumLookupKey(value));
  if (mapped === undefined) {
    throw new NormalizationError(
      `Unknown ${family} value '${value}'`,
      'UNKNOWN_ENUM_VALUE',
      value,
      undefined,
      family
    );
  }
  return mapped;
}
