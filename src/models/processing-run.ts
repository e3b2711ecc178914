/**
 * ProcessingRun interfaces - the append-only audit log of pipeline stages
 */

export type PipelineStage = 'RECEIVE' | 'PARSE' | 'NORMALIZE' | 'VALIDATE' | 'PERSIST';

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'RECEIVE',
  'PARSE',
  'NORMALIZE',
  'VALIDATE',
  'PERSIST',
];

export type RunStatus = 'PENDING' | 'RUNNING' | 'SUCCESS' | 'FAILED' | 'PARTIAL';

export const RUN_STATUSES: readonly RunStatus[] = [
  'PENDING',
  'RUNNING',
  'SUCCESS',
  'FAILED',
  'PARTIAL',
];

/** Statuses a run may be finalized with */
export type FinalRunStatus = Extract<RunStatus, 'SUCCESS' | 'FAILED' | 'PARTIAL'>;

/**
 * One audit record of a stage's outcome for a document.
 * Immutable once finished_at is set.
 */
export interface ProcessingRun {
  /** UUID v4 identifier */
  id: string;

  /** Owning document, null when the run failed before registration */
  document_id: string | null;

  stage: PipelineStage;

  status: RunStatus;

  /** Bounded first-N digest of failure reasons */
  error_summary: string | null;

  rows_attempted: number;

  rows_succeeded: number;

  rows_failed: number;

  /** ISO 8601 */
  started_at: string;

  /** ISO 8601, null while the run is open */
  finished_at: string | null;

  metadata: Record<string, unknown>;
}

/**
 * Fields written when a run is finalized
 */
export interface RunCompletion {
  status: FinalRunStatus;
  error_summary: string | null;
  rows_attempted: number;
  rows_succeeded: number;
  rows_failed: number;
  finished_at: string;
  metadata?: Record<string, unknown>;
}
