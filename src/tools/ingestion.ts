/**
 * Ingestion MCP Tools
 *
 * Tools: compliance_ingest_file, compliance_ingest_directory
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/ingestion
 */

import { z } from 'zod';
import { existsSync, statSync } from 'fs';
import { getConfig, withDatabaseOperation } from '../server/state.js';
import { successResult } from '../server/types.js';
import { pathNotFoundError, pathNotDirectoryError, validationError } from '../server/errors.js';
import {
  validateInput,
  sanitizePath,
  FileTypeSchema,
  IngestFileInput,
  IngestDirectoryInput,
} from '../utils/validation.js';
import {
  DEFAULT_FILE_TYPES,
  fileDocument,
  scanFolder,
  IngestionOrchestrator,
  type IngestionOutcome,
} from '../services/ingestion/index.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

function summarizeOutcome(outcome: IngestionOutcome): Record<string, unknown> {
  return {
    file_name: outcome.fileName,
    document_id: outcome.documentId,
    is_new: outcome.isNew,
    entity: outcome.entity,
    skipped: outcome.skipped,
    status: outcome.status,
    rows_attempted: outcome.rowsAttempted,
    rows_succeeded: outcome.rowsSucceeded,
    rows_failed: outcome.rowsFailed,
    error_summary: outcome.errorDigest,
    runs: outcome.stages.map((s) => ({ stage: s.stage, run_id: s.runId, status: s.status })),
  };
}

/**
 * Handle compliance_ingest_file - Ingest one document through every stage
 */
export async function handleIngestFile(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestFileInput, params);
    const safePath = sanitizePath(input.file_path);

    if (!existsSync(safePath)) {
      throw pathNotFoundError(safePath);
    }
    if (!statSync(safePath).isFile()) {
      throw validationError(`Path is not a file: ${safePath}`, { path: safePath });
    }

    const raw = fileDocument(safePath, input.source_kind);
    const outcome = await withDatabaseOperation(({ db }) =>
      IngestionOrchestrator.fromConfig(db, getConfig()).ingest(raw)
    );

    return formatResponse(
      successResult({
        ...summarizeOutcome(outcome),
        next_steps: [
          {
            tool: 'compliance_runs_list',
            description: 'Inspect the runs written for this document (filter by document_id)',
          },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle compliance_ingest_directory - Ingest every supported file under a folder
 */
export async function handleIngestDirectory(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestDirectoryInput, params);
    const config = getConfig();
    const safeDirPath = sanitizePath(input.directory_path ?? config.rawDataPath);

    if (!existsSync(safeDirPath)) {
      throw pathNotFoundError(safeDirPath);
    }
    if (!statSync(safeDirPath).isDirectory()) {
      throw pathNotDirectoryError(safeDirPath);
    }

    const files = scanFolder(safeDirPath, {
      recursive: input.recursive,
      fileTypes: input.file_types,
    });
    console.error(`[Ingestion] Found ${files.length} file(s) under ${safeDirPath}`);

    const batch = await withDatabaseOperation(({ db }) =>
      IngestionOrchestrator.fromConfig(db, config).ingestBatch(
        files.map((file) => fileDocument(file)),
        { maxConcurrent: input.max_concurrent ?? config.maxConcurrent }
      )
    );

    return formatResponse(
      successResult({
        directory_path: safeDirPath,
        files_found: files.length,
        totals: {
          documents: batch.totals.documents,
          new_documents: batch.totals.newDocuments,
          skipped: batch.totals.skipped,
          succeeded: batch.totals.succeeded,
          partial: batch.totals.partial,
          failed: batch.totals.failed,
          rows_attempted: batch.totals.rowsAttempted,
          rows_succeeded: batch.totals.rowsSucceeded,
          rows_failed: batch.totals.rowsFailed,
        },
        documents: batch.outcomes.map(summarizeOutcome),
        errors: batch.errors,
        next_steps: [
          { tool: 'compliance_runs_list', description: 'Review FAILED and PARTIAL runs' },
          { tool: 'compliance_db_stats', description: 'See record counts after ingestion' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const ingestionTools: Record<string, ToolDefinition> = {
  compliance_ingest_file: {
    description:
      'Register, parse and persist one CSV, PDF or text document. Re-ingesting identical bytes is a no-op on records.',
    inputSchema: {
      file_path: z.string().min(1).describe('Path to the document'),
      source_kind: z
        .enum(['TABULAR', 'UNSTRUCTURED', 'MANUAL'])
        .optional()
        .describe('Override the kind inferred from the extension'),
    },
    handler: handleIngestFile,
  },
  compliance_ingest_directory: {
    description:
      'Ingest every supported file under a folder with bounded concurrency. One document failing never stops the batch.',
    inputSchema: {
      directory_path: z
        .string()
        .min(1)
        .optional()
        .describe('Folder to scan (default: COMPLIANCE_INGEST_RAW_DATA_PATH)'),
      recursive: z.boolean().default(true).describe('Descend into subfolders'),
      file_types: z
        .array(FileTypeSchema)
        .min(1)
        .optional()
        .describe(`Extensions to include (default: ${DEFAULT_FILE_TYPES.join(', ')})`),
      max_concurrent: z
        .number()
        .int()
        .min(1)
        .max(32)
        .optional()
        .describe('Documents in flight at once (default: COMPLIANCE_INGEST_MAX_CONCURRENT)'),
    },
    handler: handleIngestDirectory,
  },
};
