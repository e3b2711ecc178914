/**
 * SQL Schema Definitions for the compliance ingestion store
 *
 * Contains all table creation SQL, triggers, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas for optimal performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Database metadata table - database info
 */
export const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Documents table - one row per distinct checksum
 */
export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  source_kind TEXT NOT NULL CHECK (source_kind IN ('TABULAR', 'UNSTRUCTURED', 'MANUAL')),
  file_name TEXT NOT NULL,
  file_path TEXT,
  checksum TEXT NOT NULL UNIQUE,
  file_size INTEGER NOT NULL CHECK (file_size >= 0),
  received_at TEXT NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}'
)
`;

/**
 * Processing runs table - append-only audit log
 */
export const CREATE_PROCESSING_RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS processing_runs (
  id TEXT PRIMARY KEY,
  document_id TEXT,
  stage TEXT NOT NULL CHECK (stage IN ('RECEIVE', 'PARSE', 'NORMALIZE', 'VALIDATE', 'PERSIST')),
  status TEXT NOT NULL CHECK (status IN ('PENDING', 'RUNNING', 'SUCCESS', 'FAILED', 'PARTIAL')),
  error_summary TEXT,
  rows_attempted INTEGER NOT NULL DEFAULT 0 CHECK (rows_attempted >= 0),
  rows_succeeded INTEGER NOT NULL DEFAULT 0 CHECK (rows_succeeded >= 0),
  rows_failed INTEGER NOT NULL DEFAULT 0 CHECK (rows_failed >= 0),
  started_at TEXT NOT NULL,
  finished_at TEXT,
  metadata TEXT NOT NULL DEFAULT '{}',
  CHECK (rows_succeeded + rows_failed <= rows_attempted),
  FOREIGN KEY (document_id) REFERENCES documents(id)
)
`;

/**
 * Inspections table
 */
export const CREATE_INSPECTIONS_TABLE = `
CREATE TABLE IF NOT EXISTS inspections (
  id TEXT PRIMARY KEY,
  inspection_id TEXT NOT NULL UNIQUE,
  document_id TEXT,
  site TEXT NOT NULL,
  production_line TEXT,
  supplier TEXT,
  part_number TEXT,
  part_description TEXT,
  inspection_date TEXT NOT NULL,
  inspector TEXT,
  result TEXT NOT NULL CHECK (result IN ('PASS', 'FAIL', 'CONDITIONAL')),
  measurement_value REAL,
  measurement_unit TEXT,
  spec_min REAL,
  spec_max REAL,
  notes TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (document_id) REFERENCES documents(id)
)
`;

/**
 * Non-conformance reports table.
 * linked_inspection_id is a soft reference: nullable, resolved by key at ingest time.
 */
export const CREATE_NCRS_TABLE = `
CREATE TABLE IF NOT EXISTS ncrs (
  id TEXT PRIMARY KEY,
  ncr_id TEXT NOT NULL UNIQUE,
  document_id TEXT,
  linked_inspection_key TEXT,
  linked_inspection_id TEXT,
  site TEXT NOT NULL,
  supplier TEXT,
  part_number TEXT,
  part_description TEXT,
  severity TEXT NOT NULL CHECK (severity IN ('LOW', 'MEDIUM', 'HIGH', 'CRITICAL')),
  status TEXT NOT NULL CHECK (status IN ('OPEN', 'IN_REVIEW', 'CLOSED', 'CANCELLED')),
  description TEXT NOT NULL,
  root_cause TEXT,
  corrective_action TEXT,
  opened_at TEXT NOT NULL,
  reviewed_at TEXT,
  closed_at TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (document_id) REFERENCES documents(id),
  FOREIGN KEY (linked_inspection_id) REFERENCES inspections(id)
)
`;

/**
 * Maintenance events table
 */
export const CREATE_MAINTENANCE_EVENTS_TABLE = `
CREATE TABLE IF NOT EXISTS maintenance_events (
  id TEXT PRIMARY KEY,
  event_id TEXT NOT NULL UNIQUE,
  document_id TEXT,
  site TEXT NOT NULL,
  machine_id TEXT NOT NULL,
  machine_description TEXT,
  event_type TEXT,
  event_date TEXT NOT NULL,
  downtime_hours REAL,
  technician TEXT,
  description TEXT,
  parts_replaced TEXT,
  notes TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (document_id) REFERENCES documents(id)
)
`;

/**
 * Audit guards: documents and finalized runs are immutable, neither can be deleted
 */
export const CREATE_AUDIT_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS documents_no_update
   BEFORE UPDATE ON documents
   BEGIN
     SELECT RAISE(ABORT, 'documents are immutable');
   END`,
  `CREATE TRIGGER IF NOT EXISTS documents_no_delete
   BEFORE DELETE ON documents
   BEGIN
     SELECT RAISE(ABORT, 'documents cannot be deleted');
   END`,
  `CREATE TRIGGER IF NOT EXISTS processing_runs_finalized_no_update
   BEFORE UPDATE ON processing_runs
   WHEN OLD.finished_at IS NOT NULL
   BEGIN
     SELECT RAISE(ABORT, 'processing run is finalized and cannot be modified');
   END`,
  `CREATE TRIGGER IF NOT EXISTS processing_runs_no_delete
   BEFORE DELETE ON processing_runs
   BEGIN
     SELECT RAISE(ABORT, 'processing runs cannot be deleted');
   END`,
] as const;

/**
 * Index definitions for query performance
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_received_at ON documents(received_at)',
  'CREATE INDEX IF NOT EXISTS idx_runs_document_id ON processing_runs(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_runs_stage_status ON processing_runs(stage, status)',
  'CREATE INDEX IF NOT EXISTS idx_runs_started_at ON processing_runs(started_at)',
  'CREATE INDEX IF NOT EXISTS idx_inspections_document_id ON inspections(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_inspections_site_date ON inspections(site, inspection_date)',
  'CREATE INDEX IF NOT EXISTS idx_ncrs_document_id ON ncrs(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_ncrs_linked_inspection_id ON ncrs(linked_inspection_id)',
  'CREATE INDEX IF NOT EXISTS idx_ncrs_linked_inspection_key ON ncrs(linked_inspection_key)',
  'CREATE INDEX IF NOT EXISTS idx_maintenance_document_id ON maintenance_events(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_maintenance_site_date ON maintenance_events(site, event_date)',
] as const;

/**
 * Tables in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'database_metadata', sql: CREATE_DATABASE_METADATA_TABLE },
  { name: 'documents', sql: CREATE_DOCUMENTS_TABLE },
  { name: 'processing_runs', sql: CREATE_PROCESSING_RUNS_TABLE },
  { name: 'inspections', sql: CREATE_INSPECTIONS_TABLE },
  { name: 'ncrs', sql: CREATE_NCRS_TABLE },
  { name: 'maintenance_events', sql: CREATE_MAINTENANCE_EVENTS_TABLE },
] as const;

export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'documents',
  'processing_runs',
  'inspections',
  'ncrs',
  'maintenance_events',
] as const;

export const REQUIRED_INDEXES = [
  'idx_runs_document_id',
  'idx_runs_stage_status',
  'idx_runs_started_at',
  'idx_ncrs_linked_inspection_id',
] as const;

export const REQUIRED_TRIGGERS = [
  'documents_no_update',
  'documents_no_delete',
  'processing_runs_finalized_no_update',
  'processing_runs_no_delete',
] as const;
