/**
 * Document source: folder scanning and raw document construction
 *
 * @module ingestion/document-source
 */

import { existsSync, lstatSync, readdirSync, statSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename, extname, resolve } from 'path';
import type { SourceKind } from '../../models/document.js';

export const DEFAULT_FILE_TYPES = ['csv', 'pdf', 'txt'] as const;

const SOURCE_KIND_BY_EXTENSION: Readonly<Record<string, SourceKind>> = {
  csv: 'TABULAR',
  pdf: 'UNSTRUCTURED',
  txt: 'UNSTRUCTURED',
};

/**
 * Where a document's bytes come from
 */
export type DocumentContent =
  | { type: 'file'; path: string }
  | { type: 'buffer'; data: Buffer };

export interface RawDocument {
  fileName: string;
  sourceKind: SourceKind;
  content: DocumentContent;
  metadata?: Record<string, unknown>;
}

export interface ScanOptions {
  recursive?: boolean;
  /** Extensions without the dot, case-insensitive */
  fileTypes?: readonly string[];
}

/**
 * List files under a folder, sorted, skipping symlinks and files whose
 * extension is not in fileTypes
 *
 * @throws Error when the path is missing or not a directory
 */
export function scanFolder(dirPath: string, options: ScanOptions = {}): string[] {
  const root = resolve(dirPath);
  if (!existsSync(root)) {
    throw new Error(`Directory not found: ${root}`);
  }
  if (!statSync(root).isDirectory()) {
    throw new Error(`Path is not a directory: ${root}`);
  }

  const recursive = options.recursive ?? true;
  const requested: readonly string[] = options.fileTypes ?? DEFAULT_FILE_TYPES;
  const fileTypes = requested.map((t) => t.replace(/^\./, '').toLowerCase());

  const collectFiles = (current: string): string[] => {
    const files: string[] = [];
    const entries = readdirSync(current, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = resolve(current, entry.name);

      try {
        if (lstatSync(fullPath).isSymbolicLink()) {
          console.error(`[WARN] Skipping symlink during scan: ${fullPath}`);
          continue;
        }
      } catch (error) {
        console.error(
          `[WARN] Could not stat entry, skipping: ${fullPath}:`,
          error instanceof Error ? error.message : String(error)
        );
        continue;
      }

      if (entry.isDirectory() && recursive) {
        files.push(...collectFiles(fullPath));
      } else if (entry.isFile()) {
        const ext = extname(entry.name).slice(1).toLowerCase();
        if (fileTypes.includes(ext)) {
          files.push(fullPath);
        }
      }
    }

    return files;
  };

  return collectFiles(root).sort();
}

/**
 * Source kind implied by a file extension, null when unsupported
 */
export function sourceKindForFile(fileName: string): SourceKind | null {
  return SOURCE_KIND_BY_EXTENSION[extname(fileName).slice(1).toLowerCase()] ?? null;
}

/**
 * Raw document backed by a file on disk
 *
 * @throws Error when no source kind is given and the extension is unsupported
 */
export function fileDocument(filePath: string, sourceKind?: SourceKind): RawDocument {
  const absolute = resolve(filePath);
  const kind = sourceKind ?? sourceKindForFile(absolute);
  if (kind === null) {
    throw new Error(`Unsupported file type: ${basename(absolute)}`);
  }
  return {
    fileName: basename(absolute),
    sourceKind: kind,
    content: { type: 'file', path: absolute },
  };
}

/**
 * Raw document backed by an in-memory upload
 */
export function bufferDocument(
  fileName: string,
  data: Buffer,
  sourceKind: SourceKind = 'MANUAL',
  metadata?: Record<string, unknown>
): RawDocument {
  return { fileName, sourceKind, content: { type: 'buffer', data }, metadata };
}

export async function readDocumentBytes(raw: RawDocument): Promise<Buffer> {
  if (raw.content.type === 'buffer') {
    return raw.content.data;
  }
  return readFile(raw.content.path);
}
