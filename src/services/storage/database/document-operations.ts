/**
 * Document operations for DatabaseService
 *
 * Documents are insert-only: a trigger rejects UPDATE and DELETE.
 */

import Database from 'better-sqlite3';
import type { Document } from '../../../models/document.js';
import type { DocumentRow } from './types.js';
import { runWithConstraintCheck, toJsonColumn } from './helpers.js';
import { rowToDocument } from './converters.js';

/**
 * Insert a new document in a single statement.
 *
 * @throws DatabaseError UNIQUE_VIOLATION when the checksum is already registered
 * @returns The document ID
 */
export function insertDocument(
  db: Database.Database,
  doc: Document,
  updateMetadataModified: () => void
): string {
  const stmt = db.prepare(`
    INSERT INTO documents (
      id, source_kind, file_name, file_path, checksum, file_size, received_at, metadata
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  runWithConstraintCheck(
    stmt,
    [
      doc.id,
      doc.source_kind,
      doc.file_name,
      doc.file_path,
      doc.checksum,
      doc.file_size,
      doc.received_at,
      toJsonColumn(doc.metadata),
    ],
    `registering document ${doc.file_name}`
  );

  updateMetadataModified();
  return doc.id;
}

export function getDocument(db: Database.Database, id: string): Document | null {
  const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as
    | DocumentRow
    | undefined;
  return row ? rowToDocument(row) : null;
}

export function getDocumentByChecksum(db: Database.Database, checksum: string): Document | null {
  const row = db.prepare('SELECT * FROM documents WHERE checksum = ?').get(checksum) as
    | DocumentRow
    | undefined;
  return row ? rowToDocument(row) : null;
}

/**
 * List documents, newest first
 */
export function listDocuments(
  db: Database.Database,
  options: { limit?: number; offset?: number } = {}
): Document[] {
  const rows = db
    .prepare('SELECT * FROM documents ORDER BY received_at DESC, id DESC LIMIT ? OFFSET ?')
    .all(options.limit ?? 100, options.offset ?? 0) as DocumentRow[];
  return rows.map(rowToDocument);
}
