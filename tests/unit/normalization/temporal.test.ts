/**
 * Date and timestamp normalization tests
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeDate,
  normalizeDateTime,
  NormalizationError,
} from '../../../src/services/normalization/index.js';

describe('normalizeDate', () => {
  it.each([
    ['2024-03-15', '2024-03-15'],
    ['2024-3-5', '2024-03-05'],
    ['03/15/2024', '2024-03-15'],
    ['15-03-2024', '2024-03-15'],
    ['2024/03/15', '2024-03-15'],
    ['  2024-03-15  ', '2024-03-15'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizeDate(raw)).toBe(expected);
  });

  it('prefers month-first for ambiguous slashed dates', () => {
    expect(normalizeDate('03/04/2024')).toBe('2024-03-04');
  });

  it('falls through to day-first when month-first is not a real date', () => {
    expect(normalizeDate('25/03/2024')).toBe('2024-03-25');
  });

  it('keeps the written date of a timestamp', () => {
    expect(normalizeDate('2024-03-15T23:30:00-02:00')).toBe('2024-03-15');
  });

  it('returns null for blank input', () => {
    expect(normalizeDate('   ')).toBeNull();
    expect(normalizeDate(null)).toBeNull();
    expect(normalizeDate(undefined)).toBeNull();
  });

  it('rejects impossible calendar dates', () => {
    expect(() => normalizeDate('2024-02-30')).toThrow("Unparseable temporal value '2024-02-30'");
  });

  it('reports the raw value and code', () => {
    try {
      normalizeDate('yesterday');
      expect.unreachable('normalizeDate should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(NormalizationError);
      expect(error).toMatchObject({ code: 'UNPARSEABLE_TEMPORAL', rawValue: 'yesterday' });
    }
  });
});

describe('normalizeDateTime', () => {
  it.each([
    ['2024-03-15 08:30', '2024-03-15T08:30:00'],
    ['2024-03-15T08:30:15', '2024-03-15T08:30:15'],
    ['2024-03-15T10:00:00.123Z', '2024-03-15T10:00:00'],
    ['03/15/2024 14:05:09', '2024-03-15T14:05:09'],
    ['2024-03-15', '2024-03-15T00:00:00'],
    ['25/03/2024', '2024-03-25T00:00:00'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizeDateTime(raw)).toBe(expected);
  });

  it('converts zoned values to UTC across a day boundary', () => {
    expect(normalizeDateTime('2024-03-15T23:30:00-02:00')).toBe('2024-03-16T01:30:00');
  });

  it('converts positive offsets', () => {
    expect(normalizeDateTime('2024-03-15T01:00:00+05:30')).toBe('2024-03-14T19:30:00');
  });

  it('rejects out-of-range times', () => {
    expect(() => normalizeDateTime('2024-03-15T24:00')).toThrow(
      "Unparseable temporal value '2024-03-15T24:00'"
    );
  });

  it('returns null for blank input', () => {
    expect(normalizeDateTime('')).toBeNull();
  });
});
