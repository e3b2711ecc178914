/**
 * Folder ingestion through the MCP tool handlers, end to end
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { resetState, updateConfig } from '../../src/server/state.js';
import {
  handleDatabaseCreate,
  handleDatabaseStats,
} from '../../src/tools/database.js';
import { handleIngestDirectory, handleIngestFile } from '../../src/tools/ingestion.js';
import { handleIngestStatus, handleRunsList } from '../../src/tools/runs.js';
import type { ToolResponse } from '../../src/tools/shared.js';
import { createTestDir, cleanupTestDir } from '../unit/database/helpers.js';

function body(response: ToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}

describe('folder ingestion pipeline', () => {
  let testDir: string;
  let rawDir: string;

  beforeAll(() => {
    resetState();
    testDir = createTestDir('pipeline-');
    rawDir = join(testDir, 'raw');
    mkdirSync(join(rawDir, 'reports'), { recursive: true });
    vi.stubEnv('COMPLIANCE_INGEST_ALLOWED_DIRS', testDir);
    updateConfig({ databasesPath: join(testDir, 'databases'), rawDataPath: rawDir });

    writeFileSync(
      join(rawDir, 'inspections.csv'),
      [
        'Inspection ID,Site,Inspection Date,Result,Measurement Value,Unit',
        'INS-1,Plant A,2024-03-15,PASS,1.25,cm',
        'INS-2,Plant A,2024-03-15,Rejected,0.98,cm',
      ].join('\n')
    );
    writeFileSync(
      join(rawDir, 'ncr_export.csv'),
      [
        'ncr_id,site,severity,status,description,opened_at,inspection_ref',
        'NCR-1,Plant A,High,Open,Burr on edge,2024-03-16 09:00,INS-1',
        'NCR-2,Plant A,urgent,Open,Dent,2024-03-16,',
      ].join('\n')
    );
    writeFileSync(
      join(rawDir, 'reports', 'NCR-5001.txt'),
      [
        'NCR Number: NCR-5001',
        'Related Inspection ID: INS-2',
        'Site: Plant A',
        'Severity: Minor',
        'Description: Surface scratch on housing',
      ].join('\n')
    );
    writeFileSync(join(rawDir, 'README.md'), 'not ingested');
  });

  afterAll(() => {
    resetState();
    vi.unstubAllEnvs();
    cleanupTestDir(testDir);
  });

  it('refuses to ingest before a database is selected', async () => {
    const response = await handleIngestFile({ file_path: join(rawDir, 'inspections.csv') });

    expect(response.isError).toBe(true);
    expect(body(response)).toMatchObject({ error: { category: 'DATABASE_NOT_SELECTED' } });
  });

  it('creates the database', async () => {
    const response = await handleDatabaseCreate({ name: 'plant_a' });
    expect(body(response)).toMatchObject({
      success: true,
      data: { name: 'plant_a', created: true, selected: true },
    });
  });

  it('ingests the folder and reports per-document outcomes', async () => {
    const response = await handleIngestDirectory({ max_concurrent: 1 });

    expect(response.isError).toBeUndefined();
    expect(body(response)).toMatchObject({
      success: true,
      data: {
        directory_path: rawDir,
        files_found: 3,
        totals: {
          documents: 3,
          new_documents: 3,
          skipped: 0,
          succeeded: 2,
          partial: 1,
          failed: 0,
          rows_attempted: 5,
          rows_succeeded: 4,
          rows_failed: 1,
        },
        documents: [
          { file_name: 'inspections.csv', entity: 'inspection', status: 'SUCCESS' },
          {
            file_name: 'ncr_export.csv',
            entity: 'ncr',
            status: 'PARTIAL',
            error_summary: "row 2: severity: Unknown ncr_severity value 'urgent'",
          },
          { file_name: 'NCR-5001.txt', entity: 'ncr', status: 'SUCCESS' },
        ],
        errors: [],
      },
    });
  });

  it('stores records with resolved links', async () => {
    const response = await handleDatabaseStats({});

    expect(body(response)).toMatchObject({
      data: {
        name: 'plant_a',
        document_count: 3,
        records: { inspections: 2, ncrs: 2, maintenance_events: 0 },
        unresolved_ncr_links: 0,
      },
    });
  });

  it('treats a second pass over the same folder as a no-op on records', async () => {
    const response = await handleIngestDirectory({ directory_path: rawDir, max_concurrent: 1 });

    expect(body(response)).toMatchObject({
      data: {
        totals: {
          documents: 3,
          new_documents: 0,
          succeeded: 2,
          partial: 1,
          failed: 0,
          rows_attempted: 5,
          rows_succeeded: 4,
          rows_failed: 1,
        },
      },
    });
    expect(body(await handleDatabaseStats({ database_name: 'plant_a' }))).toMatchObject({
      data: { document_count: 3, records: { inspections: 2, ncrs: 2, maintenance_events: 0 } },
    });
  });

  it('lists the audit log by status', async () => {
    const response = await handleRunsList({ status: 'PARTIAL' });

    expect(body(response)).toMatchObject({
      data: {
        returned: 2,
        has_more: false,
        runs: [
          { stage: 'PERSIST', status: 'PARTIAL', rows_failed: 1 },
          { stage: 'PERSIST', status: 'PARTIAL', rows_failed: 1 },
        ],
      },
    });
  });

  it('summarizes ingestion', async () => {
    const response = await handleIngestStatus({ recent_limit: 3 });

    expect(body(response)).toMatchObject({
      data: {
        database: 'plant_a',
        total_documents: 3,
        total_runs: 18,
        successful_runs: 16,
        failed_runs: 0,
        partial_runs: 2,
      },
    });
  });

  it('rejects missing paths', async () => {
    const missing = join(rawDir, 'missing.csv');
    const response = await handleIngestFile({ file_path: missing });

    expect(body(response)).toMatchObject({
      error: { category: 'PATH_NOT_FOUND', message: `Path does not exist: ${missing}` },
    });
  });
});
