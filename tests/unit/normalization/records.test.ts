/**
 * Field map to record conversion tests
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeRow,
  normalizeInspection,
  normalizeNcr,
  normalizeMaintenance,
  NormalizationError,
} from '../../../src/services/normalization/index.js';

function fields(entries: Record<string, string>): Map<string, string> {
  return new Map(Object.entries(entries));
}

describe('normalizeInspection', () => {
  it('builds a typed record with canonical values', () => {
    const record = normalizeInspection(
      fields({
        inspection_id: ' INS-1 ',
        site: 'Plant A',
        inspection_date: '03/15/2024',
        result: 'passed',
        measurement_value: '1.25',
        unit: 'cm',
        spec_min: '1.2',
        spec_max: '1.3',
        inspector: 'J. Doe',
      })
    );

    expect(record).toEqual({
      inspection_id: 'INS-1',
      site: 'Plant A',
      production_line: null,
      supplier: null,
      part_number: null,
      part_description: null,
      inspection_date: '2024-03-15',
      inspector: 'J. Doe',
      result: 'PASS',
      measurement_value: 12.5,
      measurement_unit: 'mm',
      spec_min: 12,
      spec_max: 13,
      notes: null,
    });
  });

  it('truncates over-long values', () => {
    const record = normalizeInspection(
      fields({
        inspection_id: 'INS-2',
        site: 'x'.repeat(150),
        inspection_date: '2024-03-15',
        result: 'FAIL',
      })
    );
    expect(record.site).toHaveLength(100);
  });

  it('attributes a missing required value to its field', () => {
    expect(() =>
      normalizeInspection(fields({ inspection_id: 'INS-3', inspection_date: '2024-03-15' }))
    ).toThrow('site: missing required value');
  });

  it('attributes parse failures to their field', () => {
    try {
      normalizeInspection(
        fields({ inspection_id: 'INS-4', site: 'Plant A', inspection_date: 'soon', result: 'PASS' })
      );
      expect.unreachable('normalizeInspection should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(NormalizationError);
      expect(error).toMatchObject({
        field: 'inspection_date',
        code: 'UNPARSEABLE_TEMPORAL',
        message: "inspection_date: Unparseable temporal value 'soon'",
      });
    }
  });

  it('rejects unknown results', () => {
    expect(() =>
      normalizeInspection(
        fields({ inspection_id: 'INS-5', site: 'A', inspection_date: '2024-03-15', result: 'maybe' })
      )
    ).toThrow("result: Unknown inspection_result value 'maybe'");
  });
});

describe('normalizeNcr', () => {
  const base = {
    ncr_id: 'NCR-1',
    site: 'Plant A',
    severity: 'major',
    status: 'new',
    description: 'Burr on edge',
    opened_at: '2024-03-16 09:00',
  };

  it('builds a typed record and reads the back-reference from inspection_ref', () => {
    const record = normalizeNcr(fields({ ...base, inspection_ref: 'INS-1' }));

    expect(record).toMatchObject({
      ncr_id: 'NCR-1',
      linked_inspection_key: 'INS-1',
      severity: 'HIGH',
      status: 'OPEN',
      opened_at: '2024-03-16T09:00:00',
      reviewed_at: null,
      closed_at: null,
    });
  });

  it('prefers linked_inspection_id over other reference columns', () => {
    const record = normalizeNcr(
      fields({ ...base, linked_inspection_id: 'INS-9', inspection_ref: 'INS-1' })
    );
    expect(record.linked_inspection_key).toBe('INS-9');
  });

  it('leaves the back-reference null when absent', () => {
    expect(normalizeNcr(fields(base)).linked_inspection_key).toBeNull();
  });

  it('attributes timestamp failures', () => {
    expect(() => normalizeNcr(fields({ ...base, closed_at: 'later' }))).toThrow(
      "closed_at: Unparseable temporal value 'later'"
    );
  });
});

describe('normalizeMaintenance', () => {
  it('parses downtime hours', () => {
    const record = normalizeMaintenance(
      fields({
        event_id: 'MNT-1',
        site: 'Plant A',
        machine_id: 'CNC-07',
        event_date: '15-03-2024',
        downtime_hours: '1,2.5',
      })
    );
    expect(record.event_date).toBe('2024-03-15');
    expect(record.downtime_hours).toBe(12.5);
  });

  it('attributes downtime failures', () => {
    expect(() =>
      normalizeMaintenance(
        fields({
          event_id: 'MNT-2',
          site: 'A',
          machine_id: 'M',
          event_date: '2024-03-15',
          downtime_hours: 'two',
        })
      )
    ).toThrow("downtime_hours: Unparseable numeric value 'two'");
  });
});

describe('normalizeRow', () => {
  it('tags the record with its entity and natural key', () => {
    const row = normalizeRow(
      'maintenance',
      fields({ event_id: 'MNT-3', site: 'A', machine_id: 'M', event_date: '2024-03-15' })
    );
    expect(row.entity).toBe('maintenance');
    expect(row.naturalKey).toBe('MNT-3');
  });
});
