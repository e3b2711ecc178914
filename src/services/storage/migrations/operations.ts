/**
 * Schema initialization and version checks for the v1 compliance schema
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import {
  SCHEMA_VERSION,
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_AUDIT_TRIGGERS,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
} from './schema-definitions.js';

export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly objectName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

interface DdlStep {
  operation: string;
  name: string;
  sql: string;
}

/** Name following CREATE TRIGGER/INDEX IF NOT EXISTS */
function objectName(sql: string): string {
  return /IF NOT EXISTS (\w+)/.exec(sql)?.[1] ?? 'unknown';
}

const SCHEMA_STEPS: readonly DdlStep[] = [
  { operation: 'create_table', name: 'schema_version', sql: CREATE_SCHEMA_VERSION_TABLE },
  ...TABLE_DEFINITIONS.map((table) => ({ operation: 'create_table', name: table.name, sql: table.sql })),
  ...CREATE_AUDIT_TRIGGERS.map((sql) => ({ operation: 'create_trigger', name: objectName(sql), sql })),
  ...CREATE_INDEXES.map((sql) => ({ operation: 'create_index', name: objectName(sql), sql })),
];

function runStep(db: Database.Database, step: DdlStep): void {
  try {
    db.exec(step.sql);
  } catch (error) {
    throw new MigrationError(
      `Migration step ${step.operation} failed for ${step.name}`,
      step.operation,
      step.name,
      error
    );
  }
}

/**
 * Per-connection pragmas; SQLite does not persist them, so they run on every open
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    runStep(db, { operation: 'pragma', name: pragma, sql: pragma });
  }
}

/**
 * @returns the stamped schema version, 0 when the file has none
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const table = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
      .get();
    if (!table) {
      return 0;
    }
    const row = db.prepare('SELECT version FROM schema_version WHERE id = 1').get() as
      | { version: number }
      | undefined;
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Create every table, trigger and index, then stamp metadata and version.
 * Idempotent; the version is written last in the same transaction so an
 * interrupted run leaves version 0.
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas cannot change inside a transaction
  configurePragmas(db);

  db.transaction(() => {
    for (const step of SCHEMA_STEPS) {
      runStep(db, step);
    }
    const now = new Date().toISOString();
    db.prepare(
      `INSERT OR IGNORE INTO database_metadata (id, database_name, database_version, created_at, last_modified_at)
       VALUES (1, 'compliance-ingest', '1.0.0', ?, ?)`
    ).run(now, now);
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(SCHEMA_VERSION, now, now);
  })();
}

/**
 * Bring a database to SCHEMA_VERSION.
 *
 * @throws MigrationError when the file was written by a newer release
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);
  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${currentVersion}) is newer than supported version (${SCHEMA_VERSION}). ` +
        'Please update the application.',
      'version_check',
      'schema_version'
    );
  }
  if (currentVersion < SCHEMA_VERSION) {
    initializeDatabase(db);
  }
}
