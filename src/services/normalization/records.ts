/**
 * Field map to typed record conversion
 *
 * Each builder reads the raw field map by canonical field name, applies the
 * per-field normalizer and attributes any failure to that field. The first
 * failing field fails the row.
 *
 * @module normalization/records
 */

import type {
  EntityKind,
  InspectionRecord,
  MaintenanceRecord,
  NcrRecord,
  NormalizedRecord,
} from '../../models/records.js';
import { NormalizationError } from './errors.js';
import { normalizeDate, normalizeDateTime } from './temporal.js';
import { normalizeDecimal, normalizeMeasurement } from './numeric.js';
import { normalizeEnum } from './enums.js';
import { cleanString } from './strings.js';

export type FieldMap = ReadonlyMap<string, string>;

/** Declared maximum lengths; longer values are truncated */
export const FIELD_MAX_LENGTHS: Readonly<Record<string, number>> = {
  inspection_id: 100,
  ncr_id: 100,
  event_id: 100,
  linked_inspection_key: 100,
  site: 100,
  production_line: 100,
  part_number: 100,
  machine_id: 100,
  supplier: 200,
  inspector: 200,
  technician: 200,
  event_type: 50,
};

/** Source columns accepted for the NCR back-reference, in priority order */
export const LINKED_INSPECTION_FIELDS = ['linked_inspection_id', 'inspection_ref', 'inspection_id'];

/** Source columns accepted for the measurement unit */
const UNIT_FIELDS = ['measurement_unit', 'unit'];

function firstPresent(fields: FieldMap, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = fields.get(name);
    if (value !== undefined && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
}

function inField<T>(field: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof NormalizationError) {
      throw error.forField(field);
    }
    throw error;
  }
}

function requireValue<T>(field: string, value: T | null): T {
  if (value === null) {
    throw new NormalizationError(
      'missing required value',
      'MISSING_REQUIRED_VALUE',
      ''
    ).forField(field);
  }
  return value;
}

function text(fields: FieldMap, field: string): string | null {
  return cleanString(fields.get(field), FIELD_MAX_LENGTHS[field]);
}

function requiredText(fields: FieldMap, field: string): string {
  return requireValue(field, text(fields, field));
}

export function normalizeInspection(fields: FieldMap): InspectionRecord {
  const measurement = normalizeMeasurement({
    value: fields.get('measurement_value'),
    unit: firstPresent(fields, UNIT_FIELDS),
    specMin: fields.get('spec_min'),
    specMax: fields.get('spec_max'),
  });

  return {
    inspection_id: requiredText(fields, 'inspection_id'),
    site: requiredText(fields, 'site'),
    production_line: text(fields, 'production_line'),
    supplier: text(fields, 'supplier'),
    part_number: text(fields, 'part_number'),
    part_description: text(fields, 'part_description'),
    inspection_date: requireValue(
      'inspection_date',
      inField('inspection_date', () => normalizeDate(fields.get('inspection_date')))
    ),
    inspector: text(fields, 'inspector'),
    result: requireValue(
      'result',
      inField('result', () => normalizeEnum(fields.get('result'), 'inspection_result'))
    ),
    measurement_value: measurement.value,
    measurement_unit: measurement.unit,
    spec_min: measurement.specMin,
    spec_max: measurement.specMax,
    notes: text(fields, 'notes'),
  };
}

export function normalizeNcr(fields: FieldMap): NcrRecord {
  const timestamp = (field: string): string | null =>
    inField(field, () => normalizeDateTime(fields.get(field)));

  return {
    ncr_id: requiredText(fields, 'ncr_id'),
    linked_inspection_key: cleanString(
      firstPresent(fields, LINKED_INSPECTION_FIELDS),
      FIELD_MAX_LENGTHS.linked_inspection_key
    ),
    site: requiredText(fields, 'site'),
    supplier: text(fields, 'supplier'),
    part_number: text(fields, 'part_number'),
    part_description: text(fields, 'part_description'),
    severity: requireValue(
      'severity',
      inField('severity', () => normalizeEnum(fields.get('severity'), 'ncr_severity'))
    ),
    status: requireValue(
      'status',
      inField('status', () => normalizeEnum(fields.get('status'), 'ncr_status'))
    ),
    description: requiredText(fields, 'description'),
    root_cause: text(fields, 'root_cause'),
    corrective_action: text(fields, 'corrective_action'),
    opened_at: requireValue('opened_at', timestamp('opened_at')),
    reviewed_at: timestamp('reviewed_at'),
    closed_at: timestamp('closed_at'),
  };
}

export function normalizeMaintenance(fields: FieldMap): MaintenanceRecord {
  return {
    event_id: requiredText(fields, 'event_id'),
    site: requiredText(fields, 'site'),
    machine_id: requiredText(fields, 'machine_id'),
    machine_description: text(fields, 'machine_description'),
    event_type: text(fields, 'event_type'),
    event_date: requireValue(
      'event_date',
      inField('event_date', () => normalizeDate(fields.get('event_date')))
    ),
    downtime_hours: inField('downtime_hours', () => normalizeDecimal(fields.get('downtime_hours'))),
    technician: text(fields, 'technician'),
    description: text(fields, 'description'),
    parts_replaced: text(fields, 'parts_replaced'),
    notes: text(fields, 'notes'),
  };
}

/**
 * Normalize a raw field map into the typed record for its entity
 *
 * @throws NormalizationError attributed to the first failing field
 */
export function normalizeRow(entity: EntityKind, fields: FieldMap): NormalizedRecord {
  switch (entity) {
    case 'inspection': {
      const record = normalizeInspection(fields);
      return { entity, naturalKey: record.inspection_id, record };
    }
    case 'ncr': {
      const record = normalizeNcr(fields);
      return { entity, naturalKey: record.ncr_id, record };
    }
    case 'maintenance': {
      const record = normalizeMaintenance(fields);
      return { entity, naturalKey: record.event_id, record };
    }
  }
}
