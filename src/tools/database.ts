/**
 * Database Management MCP Tools
 *
 * Tools: compliance_db_create, compliance_db_list, compliance_db_select, compliance_db_stats
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/database
 */

import { z } from 'zod';
import { DatabaseService } from '../services/storage/database/index.js';
import {
  state,
  requireDatabase,
  selectDatabase,
  createDatabase,
  getConfig,
} from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  DatabaseCreateInput,
  DatabaseListInput,
  DatabaseSelectInput,
  DatabaseStatsInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle compliance_db_create - Create a new database
 */
export async function handleDatabaseCreate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseCreateInput, params);
    const db = createDatabase(input.name, input.description);
    console.error(`[Database] Created ${input.name} at ${db.getPath()}`);

    return formatResponse(
      successResult({
        name: input.name,
        path: db.getPath(),
        created: true,
        selected: true,
        description: input.description,
        next_steps: [
          { tool: 'compliance_ingest_directory', description: 'Ingest the inbound folder' },
          { tool: 'compliance_ingest_file', description: 'Ingest a single document' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle compliance_db_list - List all databases
 */
export async function handleDatabaseList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseListInput, params);
    const { limit, offset } = input;
    const storagePath = getConfig().databasesPath;
    const allDatabases = DatabaseService.list(storagePath);

    const totalCount = allDatabases.length;
    const databases = allDatabases.slice(offset, offset + limit);

    const items = databases.map((dbInfo) => {
      const item: Record<string, unknown> = {
        name: dbInfo.name,
        path: dbInfo.path,
        size_bytes: dbInfo.size_bytes,
        created_at: dbInfo.created_at,
        modified_at: dbInfo.last_modified_at,
        selected: dbInfo.name === state.currentDatabaseName,
      };

      if (input.include_stats) {
        let statsDb: DatabaseService | null = null;
        try {
          statsDb = DatabaseService.open(dbInfo.name, storagePath);
          const stats = statsDb.getStats();
          item.document_count = stats.total_documents;
          item.run_count = stats.total_runs;
          item.record_count =
            stats.total_inspections + stats.total_ncrs + stats.total_maintenance_events;
        } catch (err) {
          const errMsg = err instanceof Error ? err.message : String(err);
          throw new Error(`Failed to get database stats for '${dbInfo.name}': ${errMsg}`);
        } finally {
          statsDb?.close();
        }
      }

      return item;
    });

    const hasMore = offset + limit < totalCount;

    return formatResponse(
      successResult({
        databases: items,
        total: totalCount,
        returned: items.length,
        offset,
        limit,
        has_more: hasMore,
        storage_path: storagePath,
        next_steps: [
          ...(hasMore
            ? [
                {
                  tool: 'compliance_db_list',
                  description: `Get next page (offset=${offset + limit})`,
                },
              ]
            : []),
          { tool: 'compliance_db_select', description: 'Select a database to work with' },
          { tool: 'compliance_db_create', description: 'Create a new database' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle compliance_db_select - Select active database
 */
export async function handleDatabaseSelect(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseSelectInput, params);
    selectDatabase(input.database_name);

    const { db } = requireDatabase();
    const stats = db.getStats();

    return formatResponse(
      successResult({
        name: input.database_name,
        path: db.getPath(),
        selected: true,
        stats: {
          document_count: stats.total_documents,
          run_count: stats.total_runs,
          inspection_count: stats.total_inspections,
          ncr_count: stats.total_ncrs,
          maintenance_event_count: stats.total_maintenance_events,
        },
        next_steps: [
          { tool: 'compliance_ingest_status', description: 'Summarize recent ingestion activity' },
          { tool: 'compliance_runs_list', description: 'Browse the processing run audit log' },
          { tool: 'compliance_db_stats', description: 'Get detailed statistics' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

function buildStatsResponse(db: DatabaseService): Record<string, unknown> {
  const stats = db.getStats();
  return {
    name: db.getName(),
    path: db.getPath(),
    size_bytes: stats.storage_size_bytes,
    document_count: stats.total_documents,
    documents_by_source_kind: stats.documents_by_source_kind,
    run_count: stats.total_runs,
    runs_by_status: stats.runs_by_status,
    records: {
      inspections: stats.total_inspections,
      ncrs: stats.total_ncrs,
      maintenance_events: stats.total_maintenance_events,
    },
    unresolved_ncr_links: stats.unresolved_ncr_links,
  };
}

/**
 * Handle compliance_db_stats - Get database statistics
 */
export async function handleDatabaseStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseStatsInput, params);

    const statsNextSteps = [
      { tool: 'compliance_runs_list', description: 'Inspect FAILED or PARTIAL runs' },
      { tool: 'compliance_ingest_status', description: 'Summarize recent ingestion activity' },
    ];

    // A named database other than the current one is opened just for this call
    if (input.database_name && input.database_name !== state.currentDatabaseName) {
      const db = DatabaseService.open(input.database_name, getConfig().databasesPath);
      try {
        return formatResponse(
          successResult({ ...buildStatsResponse(db), next_steps: statsNextSteps })
        );
      } finally {
        db.close();
      }
    }

    const { db } = requireDatabase();
    return formatResponse(successResult({ ...buildStatsResponse(db), next_steps: statsNextSteps }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const databaseTools: Record<string, ToolDefinition> = {
  compliance_db_create: {
    description:
      'Create a new compliance database and select it. Each database holds its own documents, records and run audit log.',
    inputSchema: {
      name: z
        .string()
        .min(1)
        .max(64)
        .regex(/^[a-zA-Z0-9_-]+$/)
        .describe('Database name (alphanumeric, underscore, hyphen only)'),
      description: z.string().max(500).optional().describe('Optional description for the database'),
    },
    handler: handleDatabaseCreate,
  },
  compliance_db_list: {
    description: 'List compliance databases in the configured storage folder.',
    inputSchema: {
      include_stats: z
        .boolean()
        .default(false)
        .describe('Include document, run and record counts'),
      limit: z
        .number()
        .int()
        .min(1)
        .max(500)
        .default(50)
        .describe('Maximum databases to return (default 50)'),
      offset: z.number().int().min(0).default(0).describe('Number of databases to skip'),
    },
    handler: handleDatabaseList,
  },
  compliance_db_select: {
    description: 'Select the database every ingestion and audit tool works against.',
    inputSchema: {
      database_name: z.string().min(1).describe('Name of the database to select'),
    },
    handler: handleDatabaseSelect,
  },
  compliance_db_stats: {
    description:
      'Document counts by source kind, run counts by status, record counts per entity and unresolved NCR links.',
    inputSchema: {
      database_name: z
        .string()
        .optional()
        .describe('Database name (uses current if not specified)'),
    },
    handler: handleDatabaseStats,
  },
};
