/**
 * Ingestion Orchestrator
 *
 * Drives one document through RECEIVE -> PARSE -> PERSIST, where PERSIST
 * covers normalize, validate and insert of every row. Rows are handled in
 * source order so a later row can reference a natural key inserted by an
 * earlier one. Row failures are counted, never raised; document failures
 * end that document with a FAILED run, never the batch.
 *
 * @module ingestion/orchestrator
 */

import type { Document } from '../../models/document.js';
import type {
  FinalRunStatus,
  PipelineStage,
  ProcessingRun,
  RunStatus,
} from '../../models/processing-run.js';
import type { EntityKind, NormalizedRecord } from '../../models/records.js';
import type { PipelineConfig } from '../../utils/config.js';
import { DatabaseError, DatabaseErrorCode, type DatabaseService } from '../storage/database/index.js';
import { DocumentRegistry } from '../registry/document-registry.js';
import {
  createExtractors,
  ExtractionError,
  selectExtractor,
  type ExtractedRow,
  type ExtractorSet,
  type ParsedDocument,
  type TextSource,
} from '../extraction/index.js';
import { NormalizationError, normalizeRow } from '../normalization/index.js';
import { formatProblems, REQUIRED_FIELDS, validateRequired } from '../validation/index.js';
import { DEFAULT_DIGEST_OPTIONS, type DigestOptions } from './error-digest.js';
import { RunTracker, type RunHandle } from './run-tracker.js';
import { readDocumentBytes, type RawDocument } from './document-source.js';

export interface StageOutcome {
  stage: PipelineStage;
  runId: string;
  status: RunStatus;
  rowsAttempted: number;
  rowsSucceeded: number;
  rowsFailed: number;
  errorSummary: string | null;
}

export interface IngestionOutcome {
  fileName: string;
  /** null when registration failed */
  documentId: string | null;
  isNew: boolean;
  entity: EntityKind | null;
  /** True when a known document stopped after RECEIVE */
  skipped: boolean;
  /** Status of the last stage run */
  status: FinalRunStatus;
  stages: StageOutcome[];
  rowsAttempted: number;
  rowsSucceeded: number;
  rowsFailed: number;
  errorDigest: string | null;
}

export interface BatchOutcome {
  outcomes: IngestionOutcome[];
  /** Documents whose ingest call itself threw (audit writes failed) */
  errors: Array<{ fileName: string; error: string }>;
  totals: {
    documents: number;
    newDocuments: number;
    skipped: number;
    succeeded: number;
    partial: number;
    failed: number;
    rowsAttempted: number;
    rowsSucceeded: number;
    rowsFailed: number;
  };
}

export interface OrchestratorOptions {
  extractors?: ExtractorSet;
  textSource?: TextSource;
  minTextFields?: number;
  minTextLength?: number;
  digest?: DigestOptions;
  /** Stop after RECEIVE for already registered checksums */
  skipKnownDocuments?: boolean;
}

export interface BatchOptions {
  maxConcurrent?: number;
}

export const DEFAULT_MAX_CONCURRENT = 4;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toStageOutcome(run: ProcessingRun): StageOutcome {
  return {
    stage: run.stage,
    runId: run.id,
    status: run.status,
    rowsAttempted: run.rows_attempted,
    rowsSucceeded: run.rows_succeeded,
    rowsFailed: run.rows_failed,
    errorSummary: run.error_summary,
  };
}

function finalStatus(run: ProcessingRun): FinalRunStatus {
  switch (run.status) {
    case 'SUCCESS':
    case 'PARTIAL':
    case 'FAILED':
      return run.status;
    default:
      return 'FAILED';
  }
}

/**
 * Row failure conditions. Anything else escaping a row is fatal to the
 * document.
 */
function isRowLevelStorageError(error: unknown): error is DatabaseError {
  return (
    error instanceof DatabaseError &&
    (error.code === DatabaseErrorCode.UNIQUE_VIOLATION ||
      error.code === DatabaseErrorCode.FOREIGN_KEY_VIOLATION)
  );
}

export class IngestionOrchestrator {
  private readonly registry: DocumentRegistry;
  private readonly tracker: RunTracker;
  private readonly extractors: ExtractorSet;
  private readonly skipKnownDocuments: boolean;

  constructor(
    private readonly db: DatabaseService,
    options: OrchestratorOptions = {}
  ) {
    this.registry = new DocumentRegistry(db);
    this.tracker = new RunTracker(db, options.digest ?? DEFAULT_DIGEST_OPTIONS);
    this.extractors =
      options.extractors ??
      createExtractors({
        textSource: options.textSource,
        minTextFields: options.minTextFields,
        minTextLength: options.minTextLength,
      });
    this.skipKnownDocuments = options.skipKnownDocuments ?? false;
  }

  static fromConfig(
    db: DatabaseService,
    config: PipelineConfig,
    overrides: OrchestratorOptions = {}
  ): IngestionOrchestrator {
    return new IngestionOrchestrator(db, {
      minTextFields: config.minTextFields,
      minTextLength: config.minTextLength,
      digest: { limit: config.errorDigestLimit, maxLength: config.errorDigestMaxLength },
      skipKnownDocuments: config.skipKnownDocuments,
      ...overrides,
    });
  }

  /**
   * Ingest one document end to end.
   *
   * Resolves with a FAILED outcome for document-level failures. Rejects
   * only when the audit log itself cannot be written.
   */
  async ingest(raw: RawDocument): Promise<IngestionOutcome> {
    const stages: StageOutcome[] = [];

    // RECEIVE
    let document: Document;
    let isNew: boolean;
    try {
      ({ document, isNew } = await this.registry.register(raw));
    } catch (error) {
      const message = `Registration failed for ${raw.fileName}: ${errorMessage(error)}`;
      console.error(`[Orchestrator] ${message}`);
      const run = this.tracker.recordCompleted('RECEIVE', null, 'FAILED', {
        errors: [message],
        metadata: { file_name: raw.fileName, source_kind: raw.sourceKind },
      });
      stages.push(toStageOutcome(run));
      return this.outcome(raw, null, false, null, false, stages, run);
    }

    const receiveRun = this.tracker.recordCompleted('RECEIVE', document.id, 'SUCCESS', {
      metadata: { file_name: raw.fileName, checksum: document.checksum, is_new: isNew },
    });
    stages.push(toStageOutcome(receiveRun));

    if (!isNew && this.skipKnownDocuments) {
      console.error(`[Orchestrator] ${raw.fileName} already registered as ${document.id}, skipping`);
      return this.outcome(raw, document.id, isNew, null, true, stages, receiveRun);
    }

    // PARSE
    let parsed: ParsedDocument;
    try {
      const bytes = await readDocumentBytes(raw);
      const extractor = selectExtractor(this.extractors, document.source_kind, document.file_name);
      parsed = await extractor.parse({
        fileName: document.file_name,
        bytes,
        receivedAt: document.received_at,
      });
    } catch (error) {
      const code = error instanceof ExtractionError ? error.code : 'UNREADABLE_DOCUMENT';
      const message = `${code}: ${errorMessage(error)}`;
      console.error(`[Orchestrator] Parse failed for ${raw.fileName}: ${message}`);
      const run = this.tracker.recordCompleted('PARSE', document.id, 'FAILED', {
        errors: [message],
        metadata: { error_code: code },
      });
      stages.push(toStageOutcome(run));
      return this.outcome(raw, document.id, isNew, null, false, stages, run);
    }

    const parseRun = this.tracker.recordCompleted('PARSE', document.id, 'SUCCESS', {
      metadata: parsed.metadata,
    });
    stages.push(toStageOutcome(parseRun));

    // PERSIST (normalize + validate + insert)
    const persistRun = this.persist(document, parsed);
    stages.push(toStageOutcome(persistRun));

    return this.outcome(raw, document.id, isNew, parsed.entity, false, stages, persistRun);
  }

  /**
   * Ingest documents with a bounded number in flight. One document's
   * failure never stops the rest.
   */
  async ingestBatch(raws: readonly RawDocument[], options: BatchOptions = {}): Promise<BatchOutcome> {
    const maxConcurrent = Math.max(1, options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
    const slots = new Array<IngestionOutcome | undefined>(raws.length);
    const errors: BatchOutcome['errors'] = [];

    const processOne = async (raw: RawDocument, index: number): Promise<void> => {
      try {
        slots[index] = await this.ingest(raw);
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[ERROR] Document ${raw.fileName} failed: ${message}`);
        errors.push({ fileName: raw.fileName, error: message });
      }
    };

    for (let batchStart = 0; batchStart < raws.length; batchStart += maxConcurrent) {
      const batch = raws.slice(batchStart, batchStart + maxConcurrent);
      if (batch.length > 1) {
        console.error(
          `[INFO] Processing document batch ${Math.floor(batchStart / maxConcurrent) + 1}: ` +
            `${batch.length} documents (${batchStart + 1}-${batchStart + batch.length} of ${raws.length})`
        );
      }
      await Promise.allSettled(batch.map((raw, offset) => processOne(raw, batchStart + offset)));
    }

    const outcomes = slots.filter((o): o is IngestionOutcome => o !== undefined);
    const totals: BatchOutcome['totals'] = {
      documents: raws.length,
      newDocuments: outcomes.filter((o) => o.isNew).length,
      skipped: outcomes.filter((o) => o.skipped).length,
      succeeded: outcomes.filter((o) => o.status === 'SUCCESS').length,
      partial: outcomes.filter((o) => o.status === 'PARTIAL').length,
      failed: outcomes.filter((o) => o.status === 'FAILED').length + errors.length,
      rowsAttempted: outcomes.reduce((sum, o) => sum + o.rowsAttempted, 0),
      rowsSucceeded: outcomes.reduce((sum, o) => sum + o.rowsSucceeded, 0),
      rowsFailed: outcomes.reduce((sum, o) => sum + o.rowsFailed, 0),
    };

    console.error(
      `[INFO] Batch complete: ${totals.documents} documents, ${totals.succeeded} succeeded, ` +
        `${totals.partial} partial, ${totals.failed} failed`
    );
    return { outcomes, errors, totals };
  }

  /**
   * One transaction for the whole stage, one savepoint per insert. An
   * exception escaping the row loop rolls back every insert of the
   * document and the run is finalized FAILED.
   */
  private persist(document: Document, parsed: ParsedDocument): ProcessingRun {
    const handle = this.tracker.start('PERSIST', document.id, {
      entity: parsed.entity,
      row_count: parsed.rowCount,
    });

    try {
      this.db.transaction(() => {
        for (const row of parsed.rows()) {
          this.processRow(row, document, handle);
        }
      });
    } catch (error) {
      const message = `Rolled back all inserts: ${errorMessage(error)}`;
      console.error(`[Orchestrator] ${document.file_name}: ${message}`);
      handle.recordRollback(message, parsed.rowCount);
      return handle.finalize('FAILED', { rolled_back: true });
    }

    return handle.finalize();
  }

  private processRow(row: ExtractedRow, document: Document, handle: RunHandle): void {
    const fail = (reason: string): void => {
      console.error(`[Orchestrator] ${document.file_name} ${reason}`);
      handle.recordFailure(reason);
    };

    if (row.entity === null) {
      fail(`row ${row.position}: could not determine record type`);
      return;
    }

    const problems = validateRequired(row.fields, REQUIRED_FIELDS[row.entity], row.position);
    if (problems.length > 0) {
      fail(formatProblems(problems));
      return;
    }

    let normalized: NormalizedRecord;
    try {
      normalized = normalizeRow(row.entity, row.fields);
    } catch (error) {
      if (error instanceof NormalizationError) {
        fail(`row ${row.position}: ${error.message}`);
        return;
      }
      throw error;
    }

    if (this.db.findRecordId(normalized.entity, normalized.naturalKey) !== null) {
      handle.recordSkip();
      return;
    }

    try {
      this.db.transaction(() => this.insertRecord(normalized, document.id));
      handle.recordSuccess();
    } catch (error) {
      if (isRowLevelStorageError(error)) {
        fail(`row ${row.position}: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  private insertRecord(normalized: NormalizedRecord, documentId: string): string {
    switch (normalized.entity) {
      case 'inspection':
        return this.db.insertInspection(normalized.record, documentId);
      case 'ncr': {
        const key = normalized.record.linked_inspection_key;
        const linkedId = key === null ? null : this.db.findRecordId('inspection', key);
        return this.db.insertNcr(normalized.record, documentId, linkedId);
      }
      case 'maintenance':
        return this.db.insertMaintenanceEvent(normalized.record, documentId);
    }
  }

  private outcome(
    raw: RawDocument,
    documentId: string | null,
    isNew: boolean,
    entity: EntityKind | null,
    skipped: boolean,
    stages: StageOutcome[],
    lastRun: ProcessingRun
  ): IngestionOutcome {
    return {
      fileName: raw.fileName,
      documentId,
      isNew,
      entity,
      skipped,
      status: finalStatus(lastRun),
      stages,
      rowsAttempted: lastRun.rows_attempted,
      rowsSucceeded: lastRun.rows_succeeded,
      rowsFailed: lastRun.rows_failed,
      errorDigest: lastRun.error_summary,
    };
  }
}
