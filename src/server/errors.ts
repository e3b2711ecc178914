/**
 * MCP Server Error Handling
 *
 * Every failure surfaced by a tool is an MCPError with a category, a
 * message, and a recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Database errors
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_NOT_SELECTED'
  | 'DATABASE_ALREADY_EXISTS'
  | 'DATABASE_LOCKED'
  | 'STORAGE_ERROR'
  | 'SCHEMA_ERROR'

  // Audit log errors
  | 'DOCUMENT_NOT_FOUND'
  | 'RUN_NOT_FOUND'

  // Pipeline errors
  | 'EXTRACTION_FAILED'
  | 'NORMALIZATION_FAILED'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'
  | 'PERMISSION_DENIED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 * DatabaseError is resolved by its code in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ConfigurationError: 'CONFIGURATION_ERROR',
  MigrationError: 'SCHEMA_ERROR',
  ExtractionError: 'EXTRACTION_FAILED',
  NormalizationError: 'NORMALIZATION_FAILED',
};

const DATABASE_CODE_TO_CATEGORY: Record<DatabaseErrorCode, ErrorCategory> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.DATABASE_ALREADY_EXISTS]: 'DATABASE_ALREADY_EXISTS',
  [DatabaseErrorCode.DATABASE_LOCKED]: 'DATABASE_LOCKED',
  [DatabaseErrorCode.DOCUMENT_NOT_FOUND]: 'DOCUMENT_NOT_FOUND',
  [DatabaseErrorCode.RUN_NOT_FOUND]: 'RUN_NOT_FOUND',
  [DatabaseErrorCode.RUN_ALREADY_FINALIZED]: 'STORAGE_ERROR',
  [DatabaseErrorCode.FOREIGN_KEY_VIOLATION]: 'STORAGE_ERROR',
  [DatabaseErrorCode.UNIQUE_VIOLATION]: 'STORAGE_ERROR',
  [DatabaseErrorCode.SCHEMA_MISMATCH]: 'SCHEMA_ERROR',
  [DatabaseErrorCode.PERMISSION_DENIED]: 'PERMISSION_DENIED',
  [DatabaseErrorCode.INVALID_NAME]: 'VALIDATION_ERROR',
};

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category =
        error instanceof DatabaseError
          ? DATABASE_CODE_TO_CATEGORY[error.code]
          : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      const code = errorCode(error);
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'compliance_db_list', hint: 'Check parameter types and required fields' },
  DATABASE_NOT_FOUND: {
    tool: 'compliance_db_list',
    hint: 'Use compliance_db_list to see available databases',
  },
  DATABASE_NOT_SELECTED: {
    tool: 'compliance_db_select',
    hint: 'Use compliance_db_list to find database names, then compliance_db_select',
  },
  DATABASE_ALREADY_EXISTS: { tool: 'compliance_db_list', hint: 'Choose a unique database name' },
  DATABASE_LOCKED: {
    tool: 'compliance_ingest_status',
    hint: 'Another writer holds the database; retry once it finishes',
  },
  STORAGE_ERROR: {
    tool: 'compliance_runs_list',
    hint: 'Inspect recent FAILED runs with compliance_runs_list',
  },
  SCHEMA_ERROR: {
    tool: 'compliance_db_create',
    hint: 'The database schema is incompatible; create a fresh database',
  },
  DOCUMENT_NOT_FOUND: {
    tool: 'compliance_runs_list',
    hint: 'Use compliance_runs_list to find document ids',
  },
  RUN_NOT_FOUND: { tool: 'compliance_runs_list', hint: 'Use compliance_runs_list to browse runs' },
  EXTRACTION_FAILED: {
    tool: 'compliance_runs_list',
    hint: 'Check the PARSE run error summary; the document may be unreadable or unclassifiable',
  },
  NORMALIZATION_FAILED: {
    tool: 'compliance_runs_list',
    hint: 'Check the PERSIST run error summary for the offending field and value',
  },
  PATH_NOT_FOUND: {
    tool: 'compliance_ingest_file',
    hint: 'Verify the file path exists on the filesystem',
  },
  PATH_NOT_DIRECTORY: {
    tool: 'compliance_ingest_directory',
    hint: 'Provide a directory path, not a file path',
  },
  PERMISSION_DENIED: {
    tool: 'compliance_ingest_file',
    hint: 'Check filesystem permissions and COMPLIANCE_INGEST_ALLOWED_DIRS',
  },
  CONFIGURATION_ERROR: {
    tool: 'compliance_ingest_status',
    hint: 'Check the COMPLIANCE_INGEST_* environment variables',
  },
  INTERNAL_ERROR: {
    tool: 'compliance_ingest_status',
    hint: 'Run compliance_ingest_status for diagnostics',
  },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No database selected. Use compliance_db_list to see available databases, then compliance_db_select to choose one.'
  );
}

export function databaseNotFoundError(name: string, storagePath?: string): MCPError {
  return new MCPError('DATABASE_NOT_FOUND', `Database "${name}" not found`, {
    databaseName: name,
    storagePath,
  });
}

export function databaseAlreadyExistsError(name: string): MCPError {
  return new MCPError('DATABASE_ALREADY_EXISTS', `Database "${name}" already exists`, {
    databaseName: name,
  });
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}
