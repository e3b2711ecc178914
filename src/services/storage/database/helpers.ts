/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for validation, path resolution,
 * and constraint error handling.
 */

import Database from 'better-sqlite3';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import { DEFAULT_DATABASES_PATH } from '../../../utils/config.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH =
  process.env.COMPLIANCE_INGEST_DATABASES_PATH || DEFAULT_DATABASES_PATH;

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name || typeof name !== 'string') {
    throw new DatabaseError(
      'Database name is required and must be a string',
      DatabaseErrorCode.INVALID_NAME
    );
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  return join(basePath, `${name}.db`);
}

/**
 * Run a statement, converting SQLite constraint failures into DatabaseError
 * with UNIQUE_VIOLATION or FOREIGN_KEY_VIOLATION.
 *
 * @param context - Error context message (e.g., "inserting inspection INS-001")
 */
export function runWithConstraintCheck(
  stmt: Database.Statement,
  params: unknown[],
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
      throw new DatabaseError(
        `Uniqueness violation ${context}: ${error.message}`,
        DatabaseErrorCode.UNIQUE_VIOLATION,
        error
      );
    }
    throw error;
  }
}

/**
 * Serialize a metadata object for a TEXT column
 */
export function toJsonColumn(value: Record<string, unknown> | undefined): string {
  return JSON.stringify(value ?? {});
}
