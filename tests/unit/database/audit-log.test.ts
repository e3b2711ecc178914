/**
 * Documents and Processing Runs
 *
 * Insert-only documents, append-only runs, and the triggers and
 * constraints that enforce both.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import {
  createTestDir,
  cleanupTestDir,
  createTestDocument,
  createTestRun,
  createFreshDatabase,
  safeCloseDatabase,
  DatabaseService,
} from './helpers.js';
import { DatabaseErrorCode } from '../../../src/services/storage/database/index.js';

describe('DatabaseService - Audit log', () => {
  let testDir: string;
  let db: DatabaseService;

  beforeAll(() => {
    testDir = createTestDir('db-audit-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    db = createFreshDatabase(testDir, 'audit');
  });

  afterEach(() => {
    safeCloseDatabase(db);
  });

  describe('documents', () => {
    it('round-trips a document including metadata', () => {
      const doc = createTestDocument({ metadata: { uploaded_by: 'qa' } });
      db.insertDocument(doc);

      expect(db.getDocument(doc.id)).toEqual(doc);
      expect(db.getDocumentByChecksum(doc.checksum)).toEqual(doc);
    });

    it('returns null for unknown ids and checksums', () => {
      expect(db.getDocument('nope')).toBeNull();
      expect(db.getDocumentByChecksum('sha256:' + '0'.repeat(64))).toBeNull();
    });

    it('rejects a second document with the same checksum', () => {
      const doc = createTestDocument();
      db.insertDocument(doc);

      expect(() => db.insertDocument(createTestDocument({ checksum: doc.checksum }))).toThrow(
        expect.objectContaining({ code: DatabaseErrorCode.UNIQUE_VIOLATION })
      );
    });

    it('refuses UPDATE and DELETE', () => {
      const doc = createTestDocument();
      db.insertDocument(doc);
      const conn = db.getConnection();

      expect(() =>
        conn.prepare('UPDATE documents SET file_name = ? WHERE id = ?').run('renamed.csv', doc.id)
      ).toThrow('documents are immutable');
      expect(() => conn.prepare('DELETE FROM documents WHERE id = ?').run(doc.id)).toThrow(
        'documents cannot be deleted'
      );
    });

    it('lists newest first', () => {
      const older = createTestDocument({ received_at: '2024-01-01T00:00:00.000Z' });
      const newer = createTestDocument({ received_at: '2024-02-01T00:00:00.000Z' });
      db.insertDocument(older);
      db.insertDocument(newer);

      expect(db.listDocuments().map((d) => d.id)).toEqual([newer.id, older.id]);
    });
  });

  describe('processing runs', () => {
    it('inserts an open run and finalizes it once', () => {
      const doc = createTestDocument();
      db.insertDocument(doc);
      const run = createTestRun(doc.id);
      db.insertRun(run);

      db.finalizeRun(run.id, {
        status: 'PARTIAL',
        error_summary: 'row 2: bad date',
        rows_attempted: 3,
        rows_succeeded: 2,
        rows_failed: 1,
        finished_at: '2024-03-01T08:00:05.000Z',
        metadata: { rows_skipped: 0 },
      });

      expect(db.getRun(run.id)).toMatchObject({
        status: 'PARTIAL',
        error_summary: 'row 2: bad date',
        rows_attempted: 3,
        rows_succeeded: 2,
        rows_failed: 1,
        finished_at: '2024-03-01T08:00:05.000Z',
        metadata: { rows_skipped: 0 },
      });
    });

    it('refuses a second finalization', () => {
      const run = createTestRun(null);
      db.insertRun(run);
      const completion = {
        status: 'SUCCESS' as const,
        error_summary: null,
        rows_attempted: 0,
        rows_succeeded: 0,
        rows_failed: 0,
        finished_at: new Date().toISOString(),
      };
      db.finalizeRun(run.id, completion);

      expect(() => db.finalizeRun(run.id, completion)).toThrow(
        expect.objectContaining({ code: DatabaseErrorCode.RUN_ALREADY_FINALIZED })
      );
    });

    it('reports RUN_NOT_FOUND when finalizing an unknown run', () => {
      expect(() =>
        db.finalizeRun('missing', {
          status: 'FAILED',
          error_summary: null,
          rows_attempted: 0,
          rows_succeeded: 0,
          rows_failed: 0,
          finished_at: new Date().toISOString(),
        })
      ).toThrow(expect.objectContaining({ code: DatabaseErrorCode.RUN_NOT_FOUND }));
    });

    it('rejects counters where succeeded + failed exceed attempted', () => {
      expect(() =>
        db.insertRun(createTestRun(null, { rows_attempted: 1, rows_succeeded: 1, rows_failed: 1 }))
      ).toThrow(/CHECK constraint failed/);
    });

    it('rejects a run for an unregistered document', () => {
      expect(() => db.insertRun(createTestRun('no-such-document'))).toThrow(
        expect.objectContaining({ code: DatabaseErrorCode.FOREIGN_KEY_VIOLATION })
      );
    });

    it('refuses to delete runs or modify finished ones', () => {
      const run = createTestRun(null, {
        status: 'FAILED',
        finished_at: '2024-03-01T08:00:00.000Z',
      });
      db.insertRun(run);
      const conn = db.getConnection();

      expect(() =>
        conn.prepare('UPDATE processing_runs SET status = ? WHERE id = ?').run('SUCCESS', run.id)
      ).toThrow('processing run is finalized and cannot be modified');
      expect(() => conn.prepare('DELETE FROM processing_runs WHERE id = ?').run(run.id)).toThrow(
        'processing runs cannot be deleted'
      );
    });

    it('filters listRuns by status, stage, document and time range', () => {
      const doc = createTestDocument();
      db.insertDocument(doc);
      const early = createTestRun(doc.id, {
        stage: 'RECEIVE',
        status: 'SUCCESS',
        started_at: '2024-03-01T08:00:00.000Z',
        finished_at: '2024-03-01T08:00:00.000Z',
      });
      const middle = createTestRun(doc.id, {
        stage: 'PARSE',
        status: 'FAILED',
        started_at: '2024-03-02T08:00:00.000Z',
        finished_at: '2024-03-02T08:00:00.000Z',
      });
      const late = createTestRun(null, {
        stage: 'RECEIVE',
        status: 'FAILED',
        started_at: '2024-03-03T08:00:00.000Z',
        finished_at: '2024-03-03T08:00:00.000Z',
      });
      [early, middle, late].forEach((r) => db.insertRun(r));

      expect(db.listRuns().map((r) => r.id)).toEqual([late.id, middle.id, early.id]);
      expect(db.listRuns({ status: 'FAILED' }).map((r) => r.id)).toEqual([late.id, middle.id]);
      expect(db.listRuns({ stage: 'RECEIVE' }).map((r) => r.id)).toEqual([late.id, early.id]);
      expect(db.listRuns({ documentId: doc.id }).map((r) => r.id)).toEqual([middle.id, early.id]);
      expect(
        db
          .listRuns({ from: '2024-03-02T00:00:00.000Z', to: '2024-03-02T23:59:59.999Z' })
          .map((r) => r.id)
      ).toEqual([middle.id]);
      expect(db.listRuns({ limit: 1, offset: 1 }).map((r) => r.id)).toEqual([middle.id]);
      expect(db.getRunsByDocument(doc.id).map((r) => r.id)).toEqual([early.id, middle.id]);
    });
  });

  describe('getIngestionStatus()', () => {
    it('counts runs by outcome and returns the most recent ones', () => {
      const doc = createTestDocument();
      db.insertDocument(doc);
      db.insertRun(
        createTestRun(doc.id, { status: 'SUCCESS', started_at: '2024-03-01T00:00:00.000Z' })
      );
      db.insertRun(
        createTestRun(doc.id, { status: 'PARTIAL', started_at: '2024-03-02T00:00:00.000Z' })
      );
      const latest = createTestRun(null, {
        status: 'FAILED',
        started_at: '2024-03-03T00:00:00.000Z',
      });
      db.insertRun(latest);

      const status = db.getIngestionStatus(2);
      expect(status).toMatchObject({
        total_documents: 1,
        total_runs: 3,
        successful_runs: 1,
        failed_runs: 1,
        partial_runs: 1,
      });
      expect(status.recent_runs).toHaveLength(2);
      expect(status.recent_runs[0].id).toBe(latest.id);
    });
  });
});
