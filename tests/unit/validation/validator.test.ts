/**
 * Required-field validation tests
 */

import { describe, it, expect } from 'vitest';
import {
  validateRequired,
  formatProblems,
  REQUIRED_FIELDS,
} from '../../../src/services/validation/index.js';

describe('validateRequired', () => {
  it('returns no problems for a complete row', () => {
    const fields = new Map([
      ['event_id', 'MNT-1'],
      ['site', 'Plant A'],
      ['machine_id', 'CNC-07'],
      ['event_date', '2024-03-15'],
    ]);
    expect(validateRequired(fields, REQUIRED_FIELDS.maintenance, 1)).toEqual([]);
  });

  it('reports missing and blank fields in declared order', () => {
    const fields = new Map([
      ['inspection_id', 'INS-1'],
      ['site', '   '],
      ['inspection_date', '2024-03-15'],
    ]);

    expect(validateRequired(fields, REQUIRED_FIELDS.inspection, 3)).toEqual([
      { field: 'site', position: 3, message: "Missing required field 'site'" },
      { field: 'result', position: 3, message: "Missing required field 'result'" },
    ]);
  });
});

describe('formatProblems', () => {
  it('joins messages behind the row position', () => {
    const problems = validateRequired(new Map(), ['site', 'result'], 7);
    expect(formatProblems(problems)).toBe(
      "row 7: Missing required field 'site'; Missing required field 'result'"
    );
  });

  it('is empty when there are no problems', () => {
    expect(formatProblems([])).toBe('');
  });
});
