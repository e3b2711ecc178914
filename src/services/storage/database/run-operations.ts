/**
 * Processing run operations for DatabaseService
 *
 * The processing_runs table is an append-only audit log. A run is inserted
 * when its stage starts and finalized exactly once; triggers reject any
 * later UPDATE and every DELETE.
 */

import Database from 'better-sqlite3';
import type { ProcessingRun, RunCompletion } from '../../../models/processing-run.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type ListRunsOptions,
  type ProcessingRunRow,
} from './types.js';
import { runWithConstraintCheck, toJsonColumn } from './helpers.js';
import { rowToProcessingRun } from './converters.js';

/** Upper bound on a single listing */
export const MAX_RUN_LIST_LIMIT = 1000;

export function insertRun(db: Database.Database, run: ProcessingRun): string {
  const stmt = db.prepare(`
    INSERT INTO processing_runs (
      id, document_id, stage, status, error_summary,
      rows_attempted, rows_succeeded, rows_failed,
      started_at, finished_at, metadata
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      run.id,
      run.document_id,
      run.stage,
      run.status,
      run.error_summary,
      run.rows_attempted,
      run.rows_succeeded,
      run.rows_failed,
      run.started_at,
      run.finished_at,
      toJsonColumn(run.metadata),
    ],
    `inserting ${run.stage} run: document ${String(run.document_id)} does not exist`
  );

  return run.id;
}

/**
 * Write the final status, counters and finish time of an open run.
 *
 * @throws DatabaseError RUN_NOT_FOUND or RUN_ALREADY_FINALIZED
 */
export function finalizeRun(db: Database.Database, id: string, completion: RunCompletion): void {
  const existing = db.prepare('SELECT finished_at FROM processing_runs WHERE id = ?').get(id) as
    | { finished_at: string | null }
    | undefined;

  if (!existing) {
    throw new DatabaseError(`Processing run not found: ${id}`, DatabaseErrorCode.RUN_NOT_FOUND);
  }
  if (existing.finished_at !== null) {
    throw new DatabaseError(
      `Processing run ${id} was already finalized at ${existing.finished_at}`,
      DatabaseErrorCode.RUN_ALREADY_FINALIZED
    );
  }

  const params: unknown[] = [
    completion.status,
    completion.error_summary,
    completion.rows_attempted,
    completion.rows_succeeded,
    completion.rows_failed,
    completion.finished_at,
  ];
  let metadataClause = '';
  if (completion.metadata) {
    metadataClause = ', metadata = ?';
    params.push(toJsonColumn(completion.metadata));
  }
  params.push(id);

  db.prepare(
    `
    UPDATE processing_runs
    SET status = ?, error_summary = ?, rows_attempted = ?, rows_succeeded = ?,
        rows_failed = ?, finished_at = ?${metadataClause}
    WHERE id = ? AND finished_at IS NULL
  `
  ).run(...params);
}

export function getRun(db: Database.Database, id: string): ProcessingRun | null {
  const row = db.prepare('SELECT * FROM processing_runs WHERE id = ?').get(id) as
    | ProcessingRunRow
    | undefined;
  return row ? rowToProcessingRun(row) : null;
}

/**
 * Runs of one document in the order they were started
 */
export function getRunsByDocument(db: Database.Database, documentId: string): ProcessingRun[] {
  const rows = db
    .prepare('SELECT * FROM processing_runs WHERE document_id = ? ORDER BY started_at ASC, rowid ASC')
    .all(documentId) as ProcessingRunRow[];
  return rows.map(rowToProcessingRun);
}

/**
 * List runs matching the filters, newest first
 */
export function listRuns(db: Database.Database, options: ListRunsOptions = {}): ProcessingRun[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options.status) {
    conditions.push('status = ?');
    params.push(options.status);
  }
  if (options.stage) {
    conditions.push('stage = ?');
    params.push(options.stage);
  }
  if (options.documentId) {
    conditions.push('document_id = ?');
    params.push(options.documentId);
  }
  if (options.from) {
    conditions.push('started_at >= ?');
    params.push(options.from);
  }
  if (options.to) {
    conditions.push('started_at <= ?');
    params.push(options.to);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const limit = Math.min(Math.max(options.limit ?? 100, 1), MAX_RUN_LIST_LIMIT);
  params.push(limit, options.offset ?? 0);

  const rows = db
    .prepare(
      `SELECT * FROM processing_runs ${where} ORDER BY started_at DESC, rowid DESC LIMIT ? OFFSET ?`
    )
    .all(...params) as ProcessingRunRow[];
  return rows.map(rowToProcessingRun);
}
