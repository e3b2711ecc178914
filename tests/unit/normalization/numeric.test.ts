/**
 * Decimal and unit normalization tests
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeDecimal,
  normalizeUnit,
  normalizeMeasurement,
  NormalizationError,
} from '../../../src/services/normalization/index.js';

describe('normalizeDecimal', () => {
  it.each([
    ['12', 12],
    [' 12.5 ', 12.5],
    ['1,234.5', 1234.5],
    ['-0.5', -0.5],
    ['.5', 0.5],
    ['1e3', 1000],
    ['+7', 7],
  ])('parses %s as %d', (raw, expected) => {
    expect(normalizeDecimal(raw)).toBe(expected);
  });

  it('returns null for blank input', () => {
    expect(normalizeDecimal(' ')).toBeNull();
    expect(normalizeDecimal(null)).toBeNull();
  });

  it.each(['abc', '12.3.4', '12mm', '1e999'])('rejects %s', (raw) => {
    expect(() => normalizeDecimal(raw)).toThrow(`Unparseable numeric value '${raw}'`);
  });
});

describe('normalizeUnit', () => {
  it('converts lengths to millimetres', () => {
    expect(normalizeUnit(2.5, 'cm')).toEqual({ value: 25, unit: 'mm' });
    expect(normalizeUnit(1.2, 'M')).toEqual({ value: 1200, unit: 'mm' });
  });

  it('scales fractional percentages to 0-100', () => {
    expect(normalizeUnit(0.953, 'percent')).toEqual({ value: 95.3, unit: '%' });
    expect(normalizeUnit(97, '%')).toEqual({ value: 97, unit: '%' });
  });

  it('converts kilonewtons to newtons', () => {
    expect(normalizeUnit(3, 'kN')).toEqual({ value: 3000, unit: 'N' });
  });

  it.each([
    ['millimeters', 4, 4, 'mm'],
    ['Centimeter', 2.5, 25, 'mm'],
    ['centimeters', 2.5, 25, 'mm'],
    ['meter', 1.5, 1500, 'mm'],
    ['Meters', 0.25, 250, 'mm'],
    ['newtons', 12, 12, 'N'],
    ['Kilonewton', 1.2, 1200, 'N'],
    ['kilonewtons', 3, 3000, 'N'],
  ])('maps the long unit name %s', (label, value, expected, unit) => {
    expect(normalizeUnit(value, label)).toEqual({ value: expected, unit });
  });

  it('keeps unknown units as written', () => {
    expect(normalizeUnit(5, ' psi ')).toEqual({ value: 5, unit: 'psi' });
  });
});

describe('normalizeMeasurement', () => {
  it('puts value and bounds in the same canonical unit', () => {
    expect(
      normalizeMeasurement({ value: '1.25', unit: 'cm', specMin: '1.2', specMax: '1.3' })
    ).toEqual({ value: 12.5, unit: 'mm', specMin: 12, specMax: 13 });
  });

  it('passes numbers through when no unit is given', () => {
    expect(normalizeMeasurement({ value: '5', specMax: '6' })).toEqual({
      value: 5,
      unit: null,
      specMin: null,
      specMax: 6,
    });
  });

  it('names the failing field', () => {
    try {
      normalizeMeasurement({ value: '12', specMin: 'low' });
      expect.unreachable('normalizeMeasurement should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(NormalizationError);
      expect(error).toMatchObject({
        field: 'spec_min',
        code: 'UNPARSEABLE_NUMERIC',
        message: "spec_min: Unparseable numeric value 'low'",
      });
    }
  });
});
