/**
 * Required-field validation over raw field maps
 *
 * Runs before normalization: a row missing a required field is never
 * normalized or persisted.
 *
 * @module validation/validator
 */

import type { EntityKind } from '../../models/records.js';

export interface ValidationProblem {
  field: string;
  /** 1-based row position */
  position: number;
  message: string;
}

export const REQUIRED_FIELDS: Readonly<Record<EntityKind, readonly string[]>> = {
  inspection: ['inspection_id', 'site', 'inspection_date', 'result'],
  ncr: ['ncr_id', 'site', 'severity', 'status', 'description', 'opened_at'],
  maintenance: ['event_id', 'site', 'machine_id', 'event_date'],
};

/**
 * @returns one problem per missing or blank field, in requiredFields order; empty when valid
 */
export function validateRequired(
  fields: ReadonlyMap<string, string>,
  requiredFields: readonly string[],
  position: number
): ValidationProblem[] {
  const problems: ValidationProblem[] = [];
  for (const field of requiredFields) {
    const value = fields.get(field);
    if (value === undefined || value.trim() === '') {
      problems.push({ field, position, message: `Missing required field '${field}'` });
    }
  }
  return problems;
}

/**
 * Single-line reason for a failed row, e.g.
 * "row 3: Missing required field 'site'; Missing required field 'result'"
 */
export function formatProblems(problems: readonly ValidationProblem[]): string {
  if (problems.length === 0) {
    return '';
  }
  return `row ${problems[0].position}: ${problems.map((p) => p.message).join('; ')}`;
}
