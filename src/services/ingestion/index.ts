/**
 * Ingestion Module - Public API
 */

export { IngestionOrchestrator, DEFAULT_MAX_CONCURRENT } from './orchestrator.js';
export type {
  IngestionOutcome,
  StageOutcome,
  BatchOutcome,
  BatchOptions,
  OrchestratorOptions,
} from './orchestrator.js';
export { RunTracker, RunHandle, deriveRunStatus } from './run-tracker.js';
export type { RowCounters, CompletedRunDetails } from './run-tracker.js';
export { buildErrorDigest, DEFAULT_DIGEST_OPTIONS } from './error-digest.js';
export type { DigestOptions } from './error-digest.js';
export {
  scanFolder,
  fileDocument,
  bufferDocument,
  readDocumentBytes,
  sourceKindForFile,
  DEFAULT_FILE_TYPES,
} from './document-source.js';
export type { RawDocument, DocumentContent, ScanOptions } from './document-source.js';
