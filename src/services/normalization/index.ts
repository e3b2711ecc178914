/**
 * Normalization Module - Public API
 */

export { NormalizationError } from './errors.js';
export type { NormalizationErrorCode } from './errors.js';
export { trimToNull, cleanString } from './strings.js';
export { normalizeDate, normalizeDateTime, DATE_LAYOUTS, DATETIME_LAYOUTS } from './temporal.js';
export { normalizeDecimal, normalizeUnit, normalizeMeasurement } from './numeric.js';
export type { UnitValue, Measurement, RawMeasurement } from './numeric.js';
export {
  normalizeEnum,
  enumLookupKey,
  INSPECTION_RESULT_SYNONYMS,
  NCR_STATUS_SYNONYMS,
  NCR_SEVERITY_SYNONYMS,
} from './enums.js';
export type { EnumFamily, EnumFamilies } from './enums.js';
export {
  normalizeRow,
  normalizeInspection,
  normalizeNcr,
  normalizeMaintenance,
  FIELD_MAX_LENGTHS,
  LINKED_INSPECTION_FIELDS,
} from './records.js';
export type { FieldMap } from './records.js';
