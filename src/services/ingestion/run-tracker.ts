/**
 * Run Tracker - writes the ProcessingRun audit log
 *
 * A RunHandle accumulates row counters in memory and writes them once, on
 * finalize. Runs are written outside any PERSIST transaction so the audit
 * record survives a rollback of the document's inserts.
 *
 * @module ingestion/run-tracker
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  FinalRunStatus,
  PipelineStage,
  ProcessingRun,
} from '../../models/processing-run.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseService,
} from '../storage/database/index.js';
import { buildErrorDigest, DEFAULT_DIGEST_OPTIONS, type DigestOptions } from './error-digest.js';

export interface RowCounters {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Rows whose natural key already existed (counted as succeeded) */
  skipped: number;
}

/**
 * SUCCESS when nothing failed, PARTIAL when some rows succeeded,
 * FAILED otherwise
 */
export function deriveRunStatus(counters: Pick<RowCounters, 'succeeded' | 'failed'>): FinalRunStatus {
  if (counters.failed === 0) {
    return 'SUCCESS';
  }
  return counters.succeeded > 0 ? 'PARTIAL' : 'FAILED';
}

function loadRun(db: DatabaseService, id: string): ProcessingRun {
  const run = db.getRun(id);
  if (!run) {
    throw new DatabaseError(`Processing run not found: ${id}`, DatabaseErrorCode.RUN_NOT_FOUND);
  }
  return run;
}

export class RunHandle {
  private attempted = 0;
  private succeeded = 0;
  private failed = 0;
  private skipped = 0;
  private readonly reasons: string[] = [];
  private reasonCount = 0;
  private finalized = false;

  constructor(
    private readonly db: DatabaseService,
    readonly id: string,
    readonly stage: PipelineStage,
    readonly documentId: string | null,
    private readonly digest: DigestOptions,
    private readonly metadata: Record<string, unknown>
  ) {}

  recordSuccess(): void {
    this.attempted++;
    this.succeeded++;
  }

  /** Row already ingested; counts as a success */
  recordSkip(): void {
    this.recordSuccess();
    this.skipped++;
  }

  recordFailure(reason: string): void {
    this.attempted++;
    this.failed++;
    this.addReason(reason);
  }

  /**
   * Every insert of the stage was rolled back: nothing succeeded, every
   * row of the document failed. The cause leads the digest.
   *
   * @param rowCount - rows in the document, including any not reached
   */
  recordRollback(reason: string, rowCount = this.attempted): void {
    this.attempted = Math.max(this.attempted, rowCount);
    this.succeeded = 0;
    this.skipped = 0;
    this.failed = this.attempted;
    this.reasons.unshift(reason);
    this.reasonCount++;
  }

  get counters(): RowCounters {
    return {
      attempted: this.attempted,
      succeeded: this.succeeded,
      failed: this.failed,
      skipped: this.skipped,
    };
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Write status, counters, digest and finish time.
   *
   * @param status - overrides the status derived from the counters
   * @throws DatabaseError RUN_ALREADY_FINALIZED on a second call
   */
  finalize(status?: FinalRunStatus, metadata: Record<string, unknown> = {}): ProcessingRun {
    if (this.finalized) {
      throw new DatabaseError(
        `Processing run ${this.id} was already finalized`,
        DatabaseErrorCode.RUN_ALREADY_FINALIZED
      );
    }

    const finalStatus = status ?? deriveRunStatus(this.counters);
    this.db.finalizeRun(this.id, {
      status: finalStatus,
      error_summary: buildErrorDigest(this.reasons, this.reasonCount, this.digest),
      rows_attempted: this.attempted,
      rows_succeeded: this.succeeded,
      rows_failed: this.failed,
      finished_at: new Date().toISOString(),
      metadata: { ...this.metadata, ...metadata, rows_skipped: this.skipped },
    });
    this.finalized = true;

    console.error(
      `[RunTracker] ${this.stage} run ${this.id} finalized ${finalStatus} ` +
        `(${this.succeeded}/${this.attempted} succeeded, ${this.failed} failed)`
    );
    return loadRun(this.db, this.id);
  }

  private addReason(reason: string): void {
    this.reasonCount++;
    if (this.reasons.length < this.digest.limit) {
      this.reasons.push(reason);
    }
  }
}

export interface CompletedRunDetails {
  errors?: readonly string[];
  rowsAttempted?: number;
  rowsSucceeded?: number;
  rowsFailed?: number;
  metadata?: Record<string, unknown>;
}

export class RunTracker {
  constructor(
    private readonly db: DatabaseService,
    private readonly digest: DigestOptions = DEFAULT_DIGEST_OPTIONS
  ) {}

  /**
   * Insert a RUNNING run and return a handle for its counters
   */
  start(
    stage: PipelineStage,
    documentId: string | null,
    metadata: Record<string, unknown> = {}
  ): RunHandle {
    const id = uuidv4();
    this.db.insertRun({
      id,
      document_id: documentId,
      stage,
      status: 'RUNNING',
      error_summary: null,
      rows_attempted: 0,
      rows_succeeded: 0,
      rows_failed: 0,
      started_at: new Date().toISOString(),
      finished_at: null,
      metadata,
    });
    return new RunHandle(this.db, id, stage, documentId, this.digest, metadata);
  }

  /**
   * Write a run that starts and finishes at once
   */
  recordCompleted(
    stage: PipelineStage,
    documentId: string | null,
    status: FinalRunStatus,
    details: CompletedRunDetails = {}
  ): ProcessingRun {
    const now = new Date().toISOString();
    const errors = details.errors ?? [];
    const id = uuidv4();
    this.db.insertRun({
      id,
      document_id: documentId,
      stage,
      status,
      error_summary: buildErrorDigest(errors, errors.length, this.digest),
      rows_attempted: details.rowsAttempted ?? 0,
      rows_succeeded: details.rowsSucceeded ?? 0,
      rows_failed: details.rowsFailed ?? 0,
      started_at: now,
      finished_at: now,
      metadata: details.metadata ?? {},
    });
    return loadRun(this.db, id);
  }
}
