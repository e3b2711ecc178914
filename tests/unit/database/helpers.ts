/**
 * Shared test helpers for DatabaseService tests
 *
 * Fixtures and temp-directory management used across the database,
 * registry and ingestion suites.
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { computeHash } from '../../../src/utils/hash.js';
import type { Document } from '../../../src/models/document.js';
import type { ProcessingRun } from '../../../src/models/processing-run.js';
import type {
  InspectionRecord,
  MaintenanceRecord,
  NcrRecord,
} from '../../../src/models/records.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestDocument(overrides: Partial<Document> = {}): Document {
  const id = uuidv4();
  return {
    id,
    source_kind: 'TABULAR',
    file_name: `inspections-${id}.csv`,
    file_path: `/test/inspections-${id}.csv`,
    checksum: computeHash('test document ' + id),
    file_size: 1024,
    received_at: '2024-03-01T08:00:00.000Z',
    metadata: {},
    ...overrides,
  };
}

export function createTestRun(
  documentId: string | null,
  overrides: Partial<ProcessingRun> = {}
): ProcessingRun {
  return {
    id: uuidv4(),
    document_id: documentId,
    stage: 'PERSIST',
    status: 'RUNNING',
    error_summary: null,
    rows_attempted: 0,
    rows_succeeded: 0,
    rows_failed: 0,
    started_at: new Date().toISOString(),
    finished_at: null,
    metadata: {},
    ...overrides,
  };
}

export function createTestInspection(overrides: Partial<InspectionRecord> = {}): InspectionRecord {
  return {
    inspection_id: 'INS-1001',
    site: 'Plant A',
    production_line: 'Line 3',
    supplier: 'Acme Castings',
    part_number: 'PN-42',
    part_description: 'Bracket',
    inspection_date: '2024-03-15',
    inspector: 'J. Doe',
    result: 'PASS',
    measurement_value: 12.5,
    measurement_unit: 'mm',
    spec_min: 12,
    spec_max: 13,
    notes: null,
    ...overrides,
  };
}

export function createTestNcr(overrides: Partial<NcrRecord> = {}): NcrRecord {
  return {
    ncr_id: 'NCR-2001',
    linked_inspection_key: null,
    site: 'Plant A',
    supplier: 'Acme Castings',
    part_number: 'PN-42',
    part_description: 'Bracket',
    severity: 'HIGH',
    status: 'OPEN',
    description: 'Burr on mounting face',
    root_cause: null,
    corrective_action: null,
    opened_at: '2024-03-16T09:00:00',
    reviewed_at: null,
    closed_at: null,
    ...overrides,
  };
}

export function createTestMaintenance(
  overrides: Partial<MaintenanceRecord> = {}
): MaintenanceRecord {
  return {
    event_id: 'MNT-3001',
    site: 'Plant A',
    machine_id: 'CNC-07',
    machine_description: 'Five-axis mill',
    event_type: 'Preventive',
    event_date: '2024-03-10',
    downtime_hours: 2.5,
    technician: 'R. Smith',
    description: 'Spindle bearing replaced',
    parts_replaced: 'Bearing 6204',
    notes: null,
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create a temporary directory for database tests
 */
export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTestDir(testDir: string): void {
  try {
    rmSync(testDir, { recursive: true, force: true });
  } catch (error) {
    console.error(`[test] cleanup of ${testDir} failed:`, error);
  }
}

export function createUniqueDatabaseName(prefix: string): string {
  return `${prefix}-${String(Date.now())}-${Math.random().toString(36).slice(2)}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST CONTEXT HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function createFreshDatabase(testDir: string, prefix: string): DatabaseService {
  return DatabaseService.create(createUniqueDatabaseName(prefix), undefined, testDir);
}

export function safeCloseDatabase(dbService: DatabaseService | undefined): void {
  if (dbService?.isOpen()) {
    dbService.close();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RE-EXPORTS FOR CONVENIENCE
// ═══════════════════════════════════════════════════════════════════════════════

export { DatabaseService, computeHash, existsSync, join, uuidv4 };
