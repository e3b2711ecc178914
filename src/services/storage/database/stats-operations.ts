/**
 * Statistics operations for DatabaseService
 */

import Database from 'better-sqlite3';
import { statSync } from 'fs';
import type { DatabaseStats, IngestionStatus, ProcessingRunRow } from './types.js';
import { rowToProcessingRun } from './converters.js';

/**
 * Get live database statistics
 */
export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const docStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE source_kind = 'TABULAR') as tabular,
      COUNT(*) FILTER (WHERE source_kind = 'UNSTRUCTURED') as unstructured,
      COUNT(*) FILTER (WHERE source_kind = 'MANUAL') as manual,
      COUNT(*) as total
    FROM documents
  `
    )
    .get() as { tabular: number; unstructured: number; manual: number; total: number };

  const runStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE status = 'PENDING') as pending,
      COUNT(*) FILTER (WHERE status = 'RUNNING') as running,
      COUNT(*) FILTER (WHERE status = 'SUCCESS') as success,
      COUNT(*) FILTER (WHERE status = 'FAILED') as failed,
      COUNT(*) FILTER (WHERE status = 'PARTIAL') as partial,
      COUNT(*) as total
    FROM processing_runs
  `
    )
    .get() as {
    pending: number;
    running: number;
    success: number;
    failed: number;
    partial: number;
    total: number;
  };

  const recordCounts = db
    .prepare(
      `
    SELECT
      (SELECT COUNT(*) FROM inspections) as inspections,
      (SELECT COUNT(*) FROM ncrs) as ncrs,
      (SELECT COUNT(*) FROM maintenance_events) as maintenance_events,
      (SELECT COUNT(*) FROM ncrs
        WHERE linked_inspection_key IS NOT NULL AND linked_inspection_id IS NULL) as unresolved
  `
    )
    .get() as { inspections: number; ncrs: number; maintenance_events: number; unresolved: number };

  let storageSize = 0;
  try {
    storageSize = statSync(path).size;
  } catch (error) {
    console.error(
      `[stats-operations] Could not stat database file ${path}:`,
      error instanceof Error ? error.message : String(error)
    );
  }

  return {
    name,
    total_documents: docStats.total,
    documents_by_source_kind: {
      TABULAR: docStats.tabular,
      UNSTRUCTURED: docStats.unstructured,
      MANUAL: docStats.manual,
    },
    total_runs: runStats.total,
    runs_by_status: {
      PENDING: runStats.pending,
      RUNNING: runStats.running,
      SUCCESS: runStats.success,
      FAILED: runStats.failed,
      PARTIAL: runStats.partial,
    },
    total_inspections: recordCounts.inspections,
    total_ncrs: recordCounts.ncrs,
    total_maintenance_events: recordCounts.maintenance_events,
    unresolved_ncr_links: recordCounts.unresolved,
    storage_size_bytes: storageSize,
  };
}

/**
 * Totals of the audit log plus the most recent runs
 */
export function getIngestionStatus(db: Database.Database, recentLimit: number): IngestionStatus {
  const totals = db
    .prepare(
      `
    SELECT
      (SELECT COUNT(*) FROM documents) as documents,
      COUNT(*) as runs,
      COUNT(*) FILTER (WHERE status = 'SUCCESS') as success,
      COUNT(*) FILTER (WHERE status = 'FAILED') as failed,
      COUNT(*) FILTER (WHERE status = 'PARTIAL') as partial
    FROM processing_runs
  `
    )
    .get() as { documents: number; runs: number; success: number; failed: number; partial: number };

  const recent = db
    .prepare('SELECT * FROM processing_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(recentLimit) as ProcessingRunRow[];

  return {
    total_documents: totals.documents,
    total_runs: totals.runs,
    successful_runs: totals.success,
    failed_runs: totals.failed,
    partial_runs: totals.partial,
    recent_runs: recent.map(rowToProcessingRun),
  };
}

/**
 * Update the last-modified timestamp in database_metadata
 */
export function updateMetadataModified(db: Database.Database): void {
  db.prepare('UPDATE database_metadata SET last_modified_at = ? WHERE id = 1').run(
    new Date().toISOString()
  );
}
