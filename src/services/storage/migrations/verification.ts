/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES, REQUIRED_TRIGGERS } from './schema-definitions.js';

// Columns most likely to be missing from a partially written file
const REQUIRED_COLUMNS: Record<string, string[]> = {
  documents: ['id', 'source_kind', 'checksum', 'file_size', 'received_at'],
  processing_runs: [
    'id',
    'document_id',
    'stage',
    'status',
    'rows_attempted',
    'rows_succeeded',
    'rows_failed',
    'finished_at',
  ],
  inspections: ['id', 'inspection_id', 'document_id', 'measurement_unit'],
  ncrs: ['id', 'ncr_id', 'linked_inspection_key', 'linked_inspection_id'],
  maintenance_events: ['id', 'event_id', 'machine_id'],
};

function existsInMaster(db: Database.Database, type: string, name: string): boolean {
  const row = db.prepare(`SELECT name FROM sqlite_master WHERE type = ? AND name = ?`).get(type, name);
  return row !== undefined;
}

/**
 * Verify all required tables, indexes, triggers and columns exist
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingTriggers: string[];
  missingColumns: string[];
} {
  const missingTables = REQUIRED_TABLES.filter((name) => !existsInMaster(db, 'table', name));
  const missingIndexes = REQUIRED_INDEXES.filter((name) => !existsInMaster(db, 'index', name));
  const missingTriggers = REQUIRED_TRIGGERS.filter((name) => !existsInMaster(db, 'trigger', name));
  const missingColumns: string[] = [];

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (!existsInMaster(db, 'table', table)) {
      continue;
    }
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`Table "${table}" is missing required column: ${col}`);
      }
    }
  }

  return {
    valid:
      missingTables.length === 0 &&
      missingIndexes.length === 0 &&
      missingTriggers.length === 0 &&
      missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingTriggers,
    missingColumns,
  };
}
