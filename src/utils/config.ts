/**
 * Environment configuration
 *
 * Every tunable of the pipeline is read from COMPLIANCE_INGEST_* variables
 * (loaded from .env by the entry point) and validated with zod. Invalid
 * values fail at startup.
 *
 * @module utils/config
 */

import { z } from 'zod';
import { homedir } from 'os';
import { join, resolve } from 'path';

export const ENV_PREFIX = 'COMPLIANCE_INGEST_';

export const DEFAULT_DATABASES_PATH = join(homedir(), '.compliance-ingest', 'databases');

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  COMPLIANCE_INGEST_DATABASES_PATH: z.string().min(1).default(DEFAULT_DATABASES_PATH),
  COMPLIANCE_INGEST_RAW_DATA_PATH: z.string().min(1).default('./data/raw'),
  COMPLIANCE_INGEST_MAX_CONCURRENT: z.coerce.number().int().min(1).max(32).default(4),
  COMPLIANCE_INGEST_ERROR_DIGEST_LIMIT: z.coerce.number().int().min(1).max(1000).default(10),
  COMPLIANCE_INGEST_ERROR_DIGEST_MAX_LENGTH: z.coerce
    .number()
    .int()
    .min(64)
    .max(100_000)
    .default(2000),
  COMPLIANCE_INGEST_MIN_TEXT_FIELDS: z.coerce.number().int().min(1).max(20).default(3),
  COMPLIANCE_INGEST_MIN_TEXT_LENGTH: z.coerce.number().int().min(0).default(50),
  COMPLIANCE_INGEST_SKIP_KNOWN_DOCUMENTS: booleanFlag.default('false'),
});

/**
 * Validated pipeline configuration
 */
export interface PipelineConfig {
  /** Directory holding <name>.db files */
  databasesPath: string;

  /** Default inbound folder for directory ingestion */
  rawDataPath: string;

  /** Documents processed in parallel by batch ingestion */
  maxConcurrent: number;

  /** Failure reasons kept verbatim in a run's error summary */
  errorDigestLimit: number;

  /** Maximum characters of a run's error summary */
  errorDigestMaxLength: number;

  /** Labeled fields a text extraction must find */
  minTextFields: number;

  /** Extracted text shorter than this is treated as an empty document */
  minTextLength: number;

  /** Stop after RECEIVE for documents whose checksum is already registered */
  skipKnownDocuments: boolean;
}

/**
 * Error raised when environment configuration is invalid
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Parse configuration from an environment map.
 * Empty strings are treated as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const relevant: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== '') {
      relevant[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(relevant);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  return {
    databasesPath: resolve(parsed.COMPLIANCE_INGEST_DATABASES_PATH),
    rawDataPath: resolve(parsed.COMPLIANCE_INGEST_RAW_DATA_PATH),
    maxConcurrent: parsed.COMPLIANCE_INGEST_MAX_CONCURRENT,
    errorDigestLimit: parsed.COMPLIANCE_INGEST_ERROR_DIGEST_LIMIT,
    errorDigestMaxLength: parsed.COMPLIANCE_INGEST_ERROR_DIGEST_MAX_LENGTH,
    minTextFields: parsed.COMPLIANCE_INGEST_MIN_TEXT_FIELDS,
    minTextLength: parsed.COMPLIANCE_INGEST_MIN_TEXT_LENGTH,
    skipKnownDocuments: parsed.COMPLIANCE_INGEST_SKIP_KNOWN_DOCUMENTS,
  };
}
