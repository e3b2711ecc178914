/**
 * Date and timestamp normalization
 *
 * Each value is tried against a fixed, ordered list of layouts. The first
 * layout that matches AND yields a real calendar date wins, so '25/03/2024'
 * falls through MM/DD/YYYY to DD/MM/YYYY while '03/04/2024' stays
 * March 4th.
 *
 * @module normalization/temporal
 */

import { NormalizationError } from './errors.js';
import { trimToNull } from './strings.js';

interface TemporalLayout {
  name: string;
  pattern: RegExp;
}

interface TemporalParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Minutes east of UTC when the value carried a zone, otherwise null */
  offsetMinutes: number | null;
}

export const DATE_LAYOUTS: readonly TemporalLayout[] = [
  { name: 'YYYY-MM-DD', pattern: /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})$/ },
  { name: 'MM/DD/YYYY', pattern: /^(?<month>\d{1,2})\/(?<day>\d{1,2})\/(?<year>\d{4})$/ },
  { name: 'DD-MM-YYYY', pattern: /^(?<day>\d{1,2})-(?<month>\d{1,2})-(?<year>\d{4})$/ },
  { name: 'YYYY/MM/DD', pattern: /^(?<year>\d{4})\/(?<month>\d{1,2})\/(?<day>\d{1,2})$/ },
  { name: 'DD/MM/YYYY', pattern: /^(?<day>\d{1,2})\/(?<month>\d{1,2})\/(?<year>\d{4})$/ },
];

export const DATETIME_LAYOUTS: readonly TemporalLayout[] = [
  {
    name: 'YYYY-MM-DD[T ]HH:MM[:SS[.fff]][zone]',
    pattern:
      /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})[T ](?<hour>\d{1,2}):(?<minute>\d{2})(?::(?<second>\d{2})(?:\.\d{1,9})?)?(?<zone>Z|[+-]\d{2}:?\d{2})?$/i,
  },
  {
    name: 'MM/DD/YYYY HH:MM[:SS]',
    pattern:
      /^(?<month>\d{1,2})\/(?<day>\d{1,2})\/(?<year>\d{4}) (?<hour>\d{1,2}):(?<minute>\d{2})(?::(?<second>\d{2}))?$/,
  },
];

function parseZone(zone: string | undefined): number | null {
  if (zone === undefined) {
    return null;
  }
  if (zone.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function matchLayouts(value: string, layouts: readonly TemporalLayout[]): TemporalParts | null {
  for (const layout of layouts) {
    const groups = layout.pattern.exec(value)?.groups;
    if (!groups) {
      continue;
    }
    const parts: TemporalParts = {
      year: Number(groups.year),
      month: Number(groups.month),
      day: Number(groups.day),
      hour: groups.hour !== undefined ? Number(groups.hour) : 0,
      minute: groups.minute !== undefined ? Number(groups.minute) : 0,
      second: groups.second !== undefined ? Number(groups.second) : 0,
      offsetMinutes: parseZone(groups.zone),
    };
    if (
      isValidCalendarDate(parts.year, parts.month, parts.day) &&
      parts.hour <= 23 &&
      parts.minute <= 59 &&
      parts.second <= 59
    ) {
      return parts;
    }
  }
  return null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatDate(parts: Pick<TemporalParts, 'year' | 'month' | 'day'>): string {
  return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
}

function unparseable(raw: string): NormalizationError {
  return new NormalizationError(
    `Unparseable temporal value '${raw}'`,
    'UNPARSEABLE_TEMPORAL',
    raw
  );
}

/**
 * Normalize a calendar date to YYYY-MM-DD.
 * Values with a time part keep the date as written.
 *
 * @returns null for blank input
 * @throws NormalizationError UNPARSEABLE_TEMPORAL
 */
export function normalizeDate(raw: string | null | undefined): string | null {
  const value = trimToNull(raw);
  if (value === null) {
    return null;
  }
  const parts = matchLayouts(value, DATE_LAYOUTS) ?? matchLayouts(value, DATETIME_LAYOUTS);
  if (!parts) {
    throw unparseable(value);
  }
  return formatDate(parts);
}

/**
 * Normalize a timestamp to YYYY-MM-DDTHH:MM:SS.
 *
 * Values without a zone are kept as written (site-local time). Values with
 * an explicit zone are converted to UTC. A bare date means midnight.
 *
 * @returns null for blank input
 * @throws NormalizationError UNPARSEABLE_TEMPORAL
 */
export function normalizeDateTime(raw: string | null | undefined): string | null {
  const value = trimToNull(raw);
  if (value === null) {
    return null;
  }
  const parts = matchLayouts(value, DATETIME_LAYOUTS) ?? matchLayouts(value, DATE_LAYOUTS);
  if (!parts) {
    throw unparseable(value);
  }

  if (parts.offsetMinutes !== null) {
    const utc = new Date(
      Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second) -
        parts.offsetMinutes * 60_000
    );
    return (
      `${formatDate({ year: utc.getUTCFullYear(), month: utc.getUTCMonth() + 1, day: utc.getUTCDate() })}` +
      `T${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())}`
    );
  }

  return `${formatDate(parts)}T${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
}
