/**
 * ProcessingRun audit writer tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunTracker, deriveRunStatus } from '../../../src/services/ingestion/run-tracker.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import {
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  createTestDocument,
  safeCloseDatabase,
  type DatabaseService,
} from '../database/helpers.js';

describe('deriveRunStatus', () => {
  it.each([
    [{ succeeded: 3, failed: 0 }, 'SUCCESS'],
    [{ succeeded: 0, failed: 0 }, 'SUCCESS'],
    [{ succeeded: 2, failed: 1 }, 'PARTIAL'],
    [{ succeeded: 0, failed: 4 }, 'FAILED'],
  ] as const)('%o -> %s', (counters, expected) => {
    expect(deriveRunStatus(counters)).toBe(expected);
  });
});

describe('RunTracker', () => {
  let testDir: string;
  let db: DatabaseService;
  let documentId: string;

  beforeEach(() => {
    testDir = createTestDir('run-tracker-');
    db = createFreshDatabase(testDir, 'runs');
    documentId = db.insertDocument(createTestDocument());
  });

  afterEach(() => {
    safeCloseDatabase(db);
    cleanupTestDir(testDir);
  });

  it('inserts a RUNNING run on start', () => {
    const handle = new RunTracker(db).start('PERSIST', documentId, { entity: 'inspection' });

    expect(db.getRun(handle.id)).toMatchObject({
      document_id: documentId,
      stage: 'PERSIST',
      status: 'RUNNING',
      finished_at: null,
      metadata: { entity: 'inspection' },
    });
  });

  it('writes counters, digest and derived status on finalize', () => {
    const handle = new RunTracker(db).start('PERSIST', documentId, { entity: 'inspection' });
    handle.recordSuccess();
    handle.recordFailure("row 2: Missing required field 'site'");
    handle.recordSuccess();

    const run = handle.finalize();

    expect(run).toMatchObject({
      status: 'PARTIAL',
      rows_attempted: 3,
      rows_succeeded: 2,
      rows_failed: 1,
      error_summary: "row 2: Missing required field 'site'",
      metadata: { entity: 'inspection', rows_skipped: 0 },
    });
    expect(run.finished_at).not.toBeNull();
    expect(handle.isFinalized).toBe(true);
  });

  it('counts skipped rows as successes', () => {
    const handle = new RunTracker(db).start('PERSIST', documentId);
    handle.recordSkip();
    handle.recordSuccess();

    const run = handle.finalize();
    expect(run.status).toBe('SUCCESS');
    expect(run.rows_succeeded).toBe(2);
    expect(run.error_summary).toBeNull();
    expect(run.metadata).toEqual({ rows_skipped: 1 });
  });

  it('marks every attempted row failed after a rollback', () => {
    const handle = new RunTracker(db).start('PERSIST', documentId);
    handle.recordSuccess();
    handle.recordSkip();
    handle.recordFailure('row 3: bad');
    handle.recordRollback('rolled back: disk I/O error');

    expect(handle.counters).toEqual({ attempted: 3, succeeded: 0, failed: 3, skipped: 0 });
    expect(handle.finalize()).toMatchObject({
      status: 'FAILED',
      error_summary: 'rolled back: disk I/O error; row 3: bad',
    });
  });

  it('bounds the digest by the configured limit', () => {
    const tracker = new RunTracker(db, { limit: 2, maxLength: 2000 });
    const handle = tracker.start('VALIDATE', documentId);
    for (const reason of ['a', 'b', 'c', 'd']) {
      handle.recordFailure(reason);
    }

    expect(handle.finalize().error_summary).toBe('a; b (+2 more)');
  });

  it('applies an explicit status and extra metadata', () => {
    const handle = new RunTracker(db).start('PARSE', documentId, { extractor: 'tabular' });
    const run = handle.finalize('FAILED', { error_code: 'EMPTY_DOCUMENT' });

    expect(run.status).toBe('FAILED');
    expect(run.metadata).toEqual({
      extractor: 'tabular',
      error_code: 'EMPTY_DOCUMENT',
      rows_skipped: 0,
    });
  });

  it('refuses a second finalize', () => {
    const handle = new RunTracker(db).start('PERSIST', documentId);
    handle.finalize();

    try {
      handle.finalize();
      expect.unreachable('finalize should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(DatabaseError);
      expect(error).toMatchObject({ code: DatabaseErrorCode.RUN_ALREADY_FINALIZED });
    }
  });

  it('records a completed run in one write', () => {
    const run = new RunTracker(db).recordCompleted('RECEIVE', documentId, 'SUCCESS', {
      metadata: { is_new: true },
    });

    expect(run).toMatchObject({
      stage: 'RECEIVE',
      status: 'SUCCESS',
      rows_attempted: 0,
      error_summary: null,
      metadata: { is_new: true },
    });
    expect(run.finished_at).toBe(run.started_at);
  });
});
