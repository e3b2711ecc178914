/**
 * Document Registry
 *
 * Content-addressed registration: the SHA-256 of the full byte stream is
 * a document's identity. The UNIQUE index on documents.checksum is the
 * serialization point when two workers register the same bytes at once.
 *
 * @module registry/document-registry
 */

import { stat } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type { Document, RegistrationResult } from '../../models/document.js';
import { computeHash, hashFile } from '../../utils/hash.js';
import { DatabaseError, DatabaseErrorCode, type DatabaseService } from '../storage/database/index.js';
import type { RawDocument } from '../ingestion/document-source.js';

export interface RegisterOptions {
  /** Defaults to now */
  receivedAt?: string;
}

interface Fingerprint {
  checksum: string;
  size: number;
  filePath: string | null;
}

async function fingerprint(raw: RawDocument): Promise<Fingerprint> {
  if (raw.content.type === 'buffer') {
    return { checksum: computeHash(raw.content.data), size: raw.content.data.length, filePath: null };
  }
  const checksum = await hashFile(raw.content.path);
  const { size } = await stat(raw.content.path);
  return { checksum, size, filePath: raw.content.path };
}

export class DocumentRegistry {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Register a document by content checksum.
   *
   * @returns the stored document and whether this call created it
   * @throws Error when the bytes cannot be read, DatabaseError on storage failure
   */
  async register(raw: RawDocument, options: RegisterOptions = {}): Promise<RegistrationResult> {
    const { checksum, size, filePath } = await fingerprint(raw);

    const existing = this.db.getDocumentByChecksum(checksum);
    if (existing) {
      return { document: existing, isNew: false };
    }

    const document: Document = {
      id: uuidv4(),
      source_kind: raw.sourceKind,
      file_name: raw.fileName,
      file_path: filePath,
      checksum,
      file_size: size,
      received_at: options.receivedAt ?? new Date().toISOString(),
      metadata: raw.metadata ?? {},
    };

    try {
      this.db.insertDocument(document);
    } catch (error) {
      if (error instanceof DatabaseError && error.code === DatabaseErrorCode.UNIQUE_VIOLATION) {
        const winner = this.db.getDocumentByChecksum(checksum);
        if (winner) {
          console.error(
            `[Registry] ${raw.fileName} lost a registration race, using document ${winner.id}`
          );
          return { document: winner, isNew: false };
        }
      }
      throw error;
    }

    console.error(`[Registry] Registered ${raw.fileName} as ${document.id} (${checksum})`);
    return { document, isNew: true };
  }
}
