/**
 * Type definitions for DatabaseService
 *
 * Contains all interfaces, enums, and row types used by the database service.
 */

import type { SourceKind } from '../../../models/document.js';
import type { PipelineStage, ProcessingRun, RunStatus } from '../../../models/processing-run.js';

/**
 * Database information interface
 */
export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  created_at: string;
  last_modified_at: string;
  total_documents: number;
  error?: string;
}

/**
 * Database statistics interface
 */
export interface DatabaseStats {
  name: string;
  total_documents: number;
  documents_by_source_kind: Record<SourceKind, number>;
  total_runs: number;
  runs_by_status: Record<RunStatus, number>;
  total_inspections: number;
  total_ncrs: number;
  total_maintenance_events: number;
  /** NCRs that name an inspection key which did not resolve when ingested */
  unresolved_ncr_links: number;
  storage_size_bytes: number;
}

/**
 * Summary of ingestion activity
 */
export interface IngestionStatus {
  total_documents: number;
  total_runs: number;
  successful_runs: number;
  failed_runs: number;
  partial_runs: number;
  recent_runs: ProcessingRun[];
}

/**
 * Filters for listing processing runs, newest first
 */
export interface ListRunsOptions {
  status?: RunStatus;
  stage?: PipelineStage;
  documentId?: string;
  /** Inclusive lower bound on started_at (ISO 8601) */
  from?: string;
  /** Inclusive upper bound on started_at (ISO 8601) */
  to?: string;
  limit?: number;
  offset?: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  RUN_NOT_FOUND = 'RUN_NOT_FOUND',
  RUN_ALREADY_FINALIZED = 'RUN_ALREADY_FINALIZED',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  UNIQUE_VIOLATION = 'UNIQUE_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Database row type for metadata
 */
export interface MetadataRow {
  database_name: string;
  database_version: string;
  created_at: string;
  last_modified_at: string;
}

/**
 * Database row type for documents
 */
export interface DocumentRow {
  id: string;
  source_kind: string;
  file_name: string;
  file_path: string | null;
  checksum: string;
  file_size: number;
  received_at: string;
  metadata: string;
}

/**
 * Database row type for processing runs
 */
export interface ProcessingRunRow {
  id: string;
  document_id: string | null;
  stage: string;
  status: string;
  error_summary: string | null;
  rows_attempted: number;
  rows_succeeded: number;
  rows_failed: number;
  started_at: string;
  finished_at: string | null;
  metadata: string;
}

/**
 * Database row type for inspections
 */
export interface InspectionRow {
  id: string;
  inspection_id: string;
  document_id: string | null;
  site: string;
  production_line: string | null;
  supplier: string | null;
  part_number: string | null;
  part_description: string | null;
  inspection_date: string;
  inspector: string | null;
  result: string;
  measurement_value: number | null;
  measurement_unit: string | null;
  spec_min: number | null;
  spec_max: number | null;
  notes: string | null;
  created_at: string;
}

/**
 * Database row type for NCRs
 */
export interface NcrRow {
  id: string;
  ncr_id: string;
  document_id: string | null;
  linked_inspection_key: string | null;
  linked_inspection_id: string | null;
  site: string;
  supplier: string | null;
  part_number: string | null;
  part_description: string | null;
  severity: string;
  status: string;
  description: string;
  root_cause: string | null;
  corrective_action: string | null;
  opened_at: string;
  reviewed_at: string | null;
  closed_at: string | null;
  created_at: string;
}

/**
 * Database row type for maintenance events
 */
export interface MaintenanceEventRow {
  id: string;
  event_id: string;
  document_id: string | null;
  site: string;
  machine_id: string;
  machine_description: string | null;
  event_type: string | null;
  event_date: string;
  downtime_hours: number | null;
  technician: string | null;
  description: string | null;
  parts_replaced: string | null;
  notes: string | null;
  created_at: string;
}
