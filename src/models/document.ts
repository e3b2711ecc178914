/**
 * Document interfaces for the compliance ingestion pipeline
 *
 * A Document is one raw file or blob, identified by the SHA-256 checksum
 * of its bytes. Documents are written once on first sighting and never
 * mutated afterwards.
 */

/**
 * How the document's bytes are laid out
 */
export type SourceKind = 'TABULAR' | 'UNSTRUCTURED' | 'MANUAL';

export const SOURCE_KINDS: readonly SourceKind[] = ['TABULAR', 'UNSTRUCTURED', 'MANUAL'];

/**
 * Represents a registered source document
 */
export interface Document {
  /** UUID v4 identifier */
  id: string;

  /** Declared layout of the source bytes */
  source_kind: SourceKind;

  /** Original filename */
  file_name: string;

  /** Absolute path the bytes were read from, null for uploaded buffers */
  file_path: string | null;

  /** SHA-256 of the full byte stream (format: 'sha256:...'), unique */
  checksum: string;

  /** Byte size of the source */
  file_size: number;

  /** ISO 8601 timestamp of first sighting */
  received_at: string;

  /** Free-form metadata supplied by the document source */
  metadata: Record<string, unknown>;
}

/**
 * Result of registering a document with the registry
 */
export interface RegistrationResult {
  document: Document;

  /** False when the checksum was already known (including a lost insert race) */
  isNew: boolean;
}
