/**
 * Row conversion functions for DatabaseService
 *
 * Converts database row objects to domain model interfaces.
 */

import { SOURCE_KINDS, type Document } from '../../../models/document.js';
import {
  PIPELINE_STAGES,
  RUN_STATUSES,
  type ProcessingRun,
} from '../../../models/processing-run.js';
import {
  INSPECTION_RESULTS,
  NCR_SEVERITIES,
  NCR_STATUSES,
  type Inspection,
  type MaintenanceEvent,
  type NonConformanceReport,
} from '../../../models/records.js';
import type {
  DocumentRow,
  InspectionRow,
  MaintenanceEventRow,
  NcrRow,
  ProcessingRunRow,
} from './types.js';

/**
 * Validate that a string value is a member of a union type at runtime.
 * Throws a descriptive error if the value is invalid.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  const match = validValues.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(
      `Invalid ${fieldName} "${value}" in record ${id}. Valid values: ${validValues.join(', ')}`
    );
  }
  return match;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a metadata column, returning a marker object on corrupt data.
 */
function parseMetadata(table: string, id: string, raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : { _value: parsed };
  } catch (error) {
    console.error(
      `[converters] Corrupt metadata in ${table} ${id}: ${raw}:`,
      error instanceof Error ? error.message : String(error)
    );
    return { _parse_error: true, _raw: raw };
  }
}

export function rowToDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    source_kind: validateEnum(row.source_kind, SOURCE_KINDS, 'SourceKind', row.id),
    file_name: row.file_name,
    file_path: row.file_path,
    checksum: row.checksum,
    file_size: row.file_size,
    received_at: row.received_at,
    metadata: parseMetadata('documents', row.id, row.metadata),
  };
}

export function rowToProcessingRun(row: ProcessingRunRow): ProcessingRun {
  return {
    id: row.id,
    document_id: row.document_id,
    stage: validateEnum(row.stage, PIPELINE_STAGES, 'PipelineStage', row.id),
    status: validateEnum(row.status, RUN_STATUSES, 'RunStatus', row.id),
    error_summary: row.error_summary,
    rows_attempted: row.rows_attempted,
    rows_succeeded: row.rows_succeeded,
    rows_failed: row.rows_failed,
    started_at: row.started_at,
    finished_at: row.finished_at,
    metadata: parseMetadata('processing_runs', row.id, row.metadata),
  };
}

export function rowToInspection(row: InspectionRow): Inspection {
  return {
    ...row,
    result: validateEnum(row.result, INSPECTION_RESULTS, 'InspectionResult', row.id),
  };
}

export function rowToNcr(row: NcrRow): NonConformanceReport {
  return {
    ...row,
    severity: validateEnum(row.severity, NCR_SEVERITIES, 'NcrSeverity', row.id),
    status: validateEnum(row.status, NCR_STATUSES, 'NcrStatus', row.id),
  };
}

export function rowToMaintenanceEvent(row: MaintenanceEventRow): MaintenanceEvent {
  return { ...row };
}
