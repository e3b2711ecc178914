/**
 * Extractor contract
 *
 * @module extraction/types
 */

import type { EntityKind } from '../../models/records.js';
import type { FieldMap } from '../normalization/records.js';

export interface ExtractionInput {
  fileName: string;
  bytes: Buffer;
  /** ISO 8601 time the document was registered */
  receivedAt: string;
}

export interface ExtractedRow {
  /** null when the row could not be classified */
  entity: EntityKind | null;
  fields: FieldMap;
  /** 1-based position in the source, header excluded */
  position: number;
}

export interface ParsedDocument {
  /** Entity of the whole document, or null when rows carry their own */
  entity: EntityKind | null;
  rowCount: number;
  /** A fresh iterator over the same rows on every call */
  rows(): IterableIterator<ExtractedRow>;
  /** Extraction details stored on the PARSE run */
  metadata: Record<string, unknown>;
}

export interface Extractor {
  readonly name: string;
  parse(input: ExtractionInput): Promise<ParsedDocument>;
}
