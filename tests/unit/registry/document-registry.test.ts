/**
 * Content-addressed document registration tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync } from 'fs';
import { DocumentRegistry } from '../../../src/services/registry/index.js';
import {
  bufferDocument,
  fileDocument,
} from '../../../src/services/ingestion/document-source.js';
import {
  createTestDir,
  cleanupTestDir,
  createFreshDatabase,
  safeCloseDatabase,
  computeHash,
  join,
  type DatabaseService,
} from '../database/helpers.js';

describe('DocumentRegistry', () => {
  let testDir: string;
  let db: DatabaseService;
  let registry: DocumentRegistry;

  beforeEach(() => {
    testDir = createTestDir('registry-');
    db = createFreshDatabase(testDir, 'registry');
    registry = new DocumentRegistry(db);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    safeCloseDatabase(db);
    cleanupTestDir(testDir);
  });

  it('registers new content and records its fingerprint', async () => {
    const content = Buffer.from('inspection_id,site\nINS-1,Plant A\n');
    const result = await registry.register(
      bufferDocument('upload.csv', content, 'MANUAL', { uploaded_by: 'qa' }),
      { receivedAt: '2024-03-01T08:00:00.000Z' }
    );

    expect(result.isNew).toBe(true);
    expect(result.document).toMatchObject({
      source_kind: 'MANUAL',
      file_name: 'upload.csv',
      file_path: null,
      checksum: computeHash(content),
      file_size: content.length,
      received_at: '2024-03-01T08:00:00.000Z',
      metadata: { uploaded_by: 'qa' },
    });
    expect(db.getDocument(result.document.id)).toEqual(result.document);
  });

  it('hashes files from disk and keeps their path', async () => {
    const filePath = join(testDir, 'ncr-1.txt');
    writeFileSync(filePath, 'NCR Number: NCR-1');

    const { document } = await registry.register(fileDocument(filePath));

    expect(document.file_path).toBe(filePath);
    expect(document.source_kind).toBe('UNSTRUCTURED');
    expect(document.checksum).toBe(computeHash('NCR Number: NCR-1'));
    expect(document.file_size).toBe(17);
  });

  it('returns the existing document for identical bytes under another name', async () => {
    const content = Buffer.from('same bytes');
    const first = await registry.register(bufferDocument('a.csv', content, 'TABULAR'));
    const second = await registry.register(bufferDocument('b.csv', content, 'TABULAR'));

    expect(second.isNew).toBe(false);
    expect(second.document.id).toBe(first.document.id);
    expect(second.document.file_name).toBe('a.csv');
    expect(db.listDocuments()).toHaveLength(1);
  });

  it('resolves a lost registration race to the winning document', async () => {
    const content = Buffer.from('raced bytes');
    const winner = await registry.register(bufferDocument('a.csv', content, 'TABULAR'));

    // The pre-insert lookup misses, as if the other worker had not committed yet
    vi.spyOn(db, 'getDocumentByChecksum').mockReturnValueOnce(null);
    const loser = await registry.register(bufferDocument('a.csv', content, 'TABULAR'));

    expect(loser).toEqual({ document: winner.document, isNew: false });
    expect(db.listDocuments()).toHaveLength(1);
  });

  it('propagates unreadable files', async () => {
    const missing = join(testDir, 'missing.csv');
    await expect(registry.register(fileDocument(missing))).rejects.toThrow(
      `File not found: ${missing}`
    );
  });
});
