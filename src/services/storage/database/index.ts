/**
 * Database Module - Public API
 */

export { MigrationError } from '../migrations/index.js';

export type {
  DatabaseInfo,
  DatabaseStats,
  IngestionStatus,
  ListRunsOptions,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';

export { DEFAULT_STORAGE_PATH } from './helpers.js';
export { MAX_RUN_LIST_LIMIT } from './run-operations.js';
