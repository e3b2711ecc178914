/**
 * Processing Run Audit MCP Tools
 *
 * Tools: compliance_runs_list, compliance_ingest_status
 *
 * Read-only views over the processing_runs audit log.
 *
 * @module tools/runs
 */

import { z } from 'zod';
import type { ProcessingRun } from '../models/processing-run.js';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, RunsListInput, IngestStatusInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

function formatRun(run: ProcessingRun): Record<string, unknown> {
  return {
    run_id: run.id,
    document_id: run.document_id,
    stage: run.stage,
    status: run.status,
    rows_attempted: run.rows_attempted,
    rows_succeeded: run.rows_succeeded,
    rows_failed: run.rows_failed,
    error_summary: run.error_summary,
    started_at: run.started_at,
    finished_at: run.finished_at,
    metadata: run.metadata,
  };
}

/**
 * Handle compliance_runs_list - Filter the audit log, newest first
 */
export async function handleRunsList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RunsListInput, params);
    const { db } = requireDatabase();

    const runs = db.listRuns({
      status: input.status,
      stage: input.stage,
      documentId: input.document_id,
      from: input.from,
      to: input.to,
      limit: input.limit,
      offset: input.offset,
    });
    const hasMore = runs.length === input.limit;

    return formatResponse(
      successResult({
        runs: runs.map(formatRun),
        returned: runs.length,
        offset: input.offset,
        limit: input.limit,
        has_more: hasMore,
        next_steps: hasMore
          ? [
              {
                tool: 'compliance_runs_list',
                description: `Get next page (offset=${input.offset + input.limit})`,
              },
            ]
          : [],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle compliance_ingest_status - Totals plus the most recent runs
 */
export async function handleIngestStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestStatusInput, params);
    const { db } = requireDatabase();
    const status = db.getIngestionStatus(input.recent_limit);

    return formatResponse(
      successResult({
        database: db.getName(),
        total_documents: status.total_documents,
        total_runs: status.total_runs,
        successful_runs: status.successful_runs,
        failed_runs: status.failed_runs,
        partial_runs: status.partial_runs,
        recent_runs: status.recent_runs.map(formatRun),
        next_steps: [
          {
            tool: 'compliance_runs_list',
            description: 'Filter runs by status, stage, document or time range',
          },
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

export const runTools: Record<string, ToolDefinition> = {
  compliance_runs_list: {
    description:
      'List processing runs newest first, filtered by status, stage, document and started_at range.',
    inputSchema: {
      status: z
        .enum(['PENDING', 'RUNNING', 'SUCCESS', 'FAILED', 'PARTIAL'])
        .optional()
        .describe('Run status filter'),
      stage: z
        .enum(['RECEIVE', 'PARSE', 'NORMALIZE', 'VALIDATE', 'PERSIST'])
        .optional()
        .describe('Pipeline stage filter'),
      document_id: z.string().min(1).optional().describe('Only runs for this document'),
      from: z.string().optional().describe('Inclusive lower bound on started_at (ISO 8601)'),
      to: z.string().optional().describe('Inclusive upper bound on started_at (ISO 8601)'),
      limit: z.number().int().min(1).max(1000).default(100).describe('Maximum runs to return'),
      offset: z.number().int().min(0).default(0).describe('Number of runs to skip'),
    },
    handler: handleRunsList,
  },
  compliance_ingest_status: {
    description:
      'Summarize ingestion: document count, run counts by outcome, and the most recent runs.',
    inputSchema: {
      recent_limit: z
        .number()
        .int()
        .min(1)
        .max(100)
        .default(10)
        .describe('Recent runs to include'),
    },
    handler: handleIngestStatus,
  },
};
