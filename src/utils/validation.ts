/**
 * Compliance Ingest MCP - Zod Validation Schemas
 *
 * Input validation for every MCP tool. Each schema carries its
 * constraints, error messages and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir } from 'os';
import { DEFAULT_DATABASES_PATH } from './config.js';
import { DEFAULT_FILE_TYPES } from '../services/ingestion/document-source.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export const PipelineStageSchema = z.enum(['RECEIVE', 'PARSE', 'NORMALIZE', 'VALIDATE', 'PERSIST']);
export const RunStatusSchema = z.enum(['PENDING', 'RUNNING', 'SUCCESS', 'FAILED', 'PARTIAL']);
export const SourceKindSchema = z.enum(['TABULAR', 'UNSTRUCTURED', 'MANUAL']);

/** Extensions the extractors can read */
export const FileTypeSchema = z.enum(['csv', 'pdf', 'txt'], {
  errorMap: () => ({
    message: `Unsupported file type, expected one of: ${DEFAULT_FILE_TYPES.join(', ')}`,
  }),
});

/**
 * ISO 8601 date or timestamp, as stored in started_at
 */
const IsoTimestamp = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/,
    'Must be an ISO 8601 date or timestamp'
  );

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DatabaseCreateInput = z.object({
  name: z
    .string()
    .min(1, 'Database name is required')
    .max(64, 'Database name must be 64 characters or less')
    .regex(
      /^[a-zA-Z0-9_-]+$/,
      'Database name must contain only alphanumeric characters, underscores, and hyphens'
    ),
  description: z.string().max(500, 'Description must be 500 characters or less').optional(),
});

export const DatabaseListInput = z.object({
  include_stats: z.boolean().default(false),
  limit: z
    .number()
    .int()
    .min(1)
    .max(500)
    .default(50)
    .describe('Maximum number of databases to return (default 50)'),
  offset: z
    .number()
    .int()
    .min(0)
    .default(0)
    .describe('Number of databases to skip for pagination'),
});

export const DatabaseSelectInput = z.object({
  database_name: z.string().min(1, 'Database name is required'),
});

export const DatabaseStatsInput = z.object({
  database_name: z.string().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const IngestFileInput = z.object({
  file_path: z.string().min(1, 'File path is required'),
  source_kind: SourceKindSchema.optional().describe(
    'Override the kind inferred from the extension (csv -> TABULAR, pdf/txt -> UNSTRUCTURED)'
  ),
});

export const IngestDirectoryInput = z.object({
  directory_path: z
    .string()
    .min(1)
    .optional()
    .describe('Folder to scan (default: COMPLIANCE_INGEST_RAW_DATA_PATH)'),
  recursive: z.boolean().default(true),
  file_types: z
    .array(FileTypeSchema)
    .min(1)
    .optional()
    .default([...DEFAULT_FILE_TYPES]),
  max_concurrent: z.number().int().min(1).max(32).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// AUDIT LOG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const RunsListInput = z.object({
  status: RunStatusSchema.optional(),
  stage: PipelineStageSchema.optional(),
  document_id: z.string().min(1).optional(),
  from: IsoTimestamp.optional().describe('Inclusive lower bound on started_at'),
  to: IsoTimestamp.optional().describe('Inclusive upper bound on started_at'),
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export const IngestStatusInput = z.object({
  recent_limit: z.number().int().min(1).max(100).default(10),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default allowed base directories: the database folder, the home
 * directory, /tmp, the working directory, and COMPLIANCE_INGEST_ALLOWED_DIRS.
 * Read at call time so environment changes apply.
 */
function getDefaultAllowedBaseDirs(): string[] {
  const storagePath = process.env.COMPLIANCE_INGEST_DATABASES_PATH || DEFAULT_DATABASES_PATH;

  const dirs = [
    path.resolve(storagePath),
    path.resolve(homedir()),
    path.resolve('/tmp'),
    path.resolve(process.cwd()),
  ];

  const extraDirs = process.env.COMPLIANCE_INGEST_ALLOWED_DIRS;
  if (extraDirs) {
    for (const d of extraDirs.split(',')) {
      const trimmed = d.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }

  return dirs;
}

/**
 * Resolve a path and confirm it lies inside an allowed base directory.
 *
 * @param allowedBaseDirs - defaults to getDefaultAllowedBaseDirs()
 * @returns the resolved path
 * @throws ValidationError on null bytes or a path outside every base
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set COMPLIANCE_INGEST_ALLOWED_DIRS ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}
