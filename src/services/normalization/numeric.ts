/**
 * Decimal and unit normalization
 *
 * @module normalization/numeric
 */

import { NormalizationError } from './errors.js';
import { trimToNull } from './strings.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface UnitValue {
  value: number;
  unit: string;
}

interface UnitRule {
  canonical: string;
  convert: (value: number) => number;
}

const PERCENT: UnitRule = {
  canonical: '%',
  convert: (value) => (value <= 1 ? value * 100 : value),
};

const MILLIMETRE: UnitRule = { canonical: 'mm', convert: (value) => value };
const CENTIMETRE: UnitRule = { canonical: 'mm', convert: (value) => value * 10 };
const METRE: UnitRule = { canonical: 'mm', convert: (value) => value * 1000 };
const NEWTON: UnitRule = { canonical: 'N', convert: (value) => value };
const KILONEWTON: UnitRule = { canonical: 'N', convert: (value) => value * 1000 };

const UNIT_RULES: ReadonlyMap<string, UnitRule> = new Map<string, UnitRule>([
  ['%', PERCENT],
  ['percent', PERCENT],
  ['pct', PERCENT],
  ['mm', MILLIMETRE],
  ['millimeter', MILLIMETRE],
  ['millimeters', MILLIMETRE],
  ['cm', CENTIMETRE],
  ['centimeter', CENTIMETRE],
  ['centimeters', CENTIMETRE],
  ['m', METRE],
  ['meter', METRE],
  ['meters', METRE],
  ['n', NEWTON],
  ['newton', NEWTON],
  ['newtons', NEWTON],
  ['kn', KILONEWTON],
  ['kilonewton', KILONEWTON],
  ['kilonewtons', KILONEWTON],
]);

/** Drop binary float noise such as 12.300000000000001 */
function roundDecimals(value: number): number {
  return parseFloat(value.toFixed(10));
}

/**
 * Parse a decimal, ignoring whitespace and thousands separators.
 *
 * @returns null for blank input
 * @throws NormalizationError UNPARSEABLE_NUMERIC
 */
export function normalizeDecimal(raw: string | null | undefined): number | null {
  const value = trimToNull(raw);
  if (value === null) {
    return null;
  }
  const compact = value.replace(/[\s,]/g, '');
  if (!DECIMAL_PATTERN.test(compact)) {
    throw new NormalizationError(`Unparseable numeric value '${value}'`, 'UNPARSEABLE_NUMERIC', value);
  }
  const parsed = Number(compact);
  if (!Number.isFinite(parsed)) {
    throw new NormalizationError(`Unparseable numeric value '${value}'`, 'UNPARSEABLE_NUMERIC', value);
  }
  return parsed;
}

/**
 * Map a value and unit label into its canonical unit family.
 * Percentages become 0-100, lengths millimetres, forces newtons.
 * Unknown labels keep the value and the label as written (trimmed).
 */
export function normalizeUnit(value: number, unit: string): UnitValue {
  const label = unit.trim();
  const rule = UNIT_RULES.get(label.toLowerCase());
  if (!rule) {
    return { value, unit: label };
  }
  return { value: roundDecimals(rule.convert(value)), unit: rule.canonical };
}

export interface Measurement {
  value: number | null;
  unit: string | null;
  specMin: number | null;
  specMax: number | null;
}

export interface RawMeasurement {
  value?: string | null;
  unit?: string | null;
  specMin?: string | null;
  specMax?: string | null;
}

function decimalField(field: string, raw: string | null | undefined): number | null {
  try {
    return normalizeDecimal(raw);
  } catch (error) {
    if (error instanceof NormalizationError) {
      throw error.forField(field);
    }
    throw error;
  }
}

/**
 * Normalize a measured value together with its spec bounds so all three
 * land in the same canonical unit. Bounds follow the measured value's unit
 * label. Failures name the offending field.
 */
export function normalizeMeasurement(raw: RawMeasurement): Measurement {
  const value = decimalField('measurement_value', raw.value);
  const specMin = decimalField('spec_min', raw.specMin);
  const specMax = decimalField('spec_max', raw.specMax);
  const unit = trimToNull(raw.unit);

  if (unit === null) {
    return { value, unit: null, specMin, specMax };
  }

  const convert = (n: number | null): number | null =>
    n === null ? null : normalizeUnit(n, unit).value;
  return {
    value: convert(value),
    unit: normalizeUnit(0, unit).unit,
    specMin: convert(specMin),
    specMax: convert(specMax),
  };
}
