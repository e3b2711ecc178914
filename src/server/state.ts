/**
 * MCP Server State Management
 *
 * Holds the selected database connection and the pipeline configuration.
 * FAIL FAST: state access throws immediately if preconditions are not met.
 *
 * @module server/state
 */

import { DatabaseService } from '../services/storage/database/index.js';
import { loadConfig, type PipelineConfig } from '../utils/config.js';
import {
  databaseNotSelectedError,
  databaseNotFoundError,
  databaseAlreadyExistsError,
} from './errors.js';
import type { ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state. The entry point replaces config with the
 * environment-derived one before the transport connects.
 */
export const state: ServerState = {
  currentDatabase: null,
  currentDatabaseName: null,
  config: loadConfig({}),
};

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

interface DatabaseServices {
  db: DatabaseService;
  /** Generation counter for detecting stale references */
  generation: number;
}

/**
 * Incremented on every database switch or clear
 */
let _dbGeneration = 0;

/**
 * In-flight async database operations. selectDatabase() and
 * clearDatabase() refuse to proceed while this is above zero.
 */
let _activeOperations = 0;

/**
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is selected
 */
export function requireDatabase(): DatabaseServices {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }
  return { db: state.currentDatabase, generation: _dbGeneration };
}

/**
 * @throws Error if the database was switched since expectedGeneration was read
 */
export function validateGeneration(expectedGeneration: number): void {
  if (_dbGeneration !== expectedGeneration) {
    throw new Error(
      `Database generation mismatch: expected ${expectedGeneration}, current ${_dbGeneration}. ` +
        `The database was switched during this operation. Retry with the current database.`
    );
  }
}

/**
 * Get the number of active database operations (for diagnostics/testing).
 */
export function getActiveOperationCount(): number {
  return _activeOperations;
}

/**
 * Run an async function while the selected database is pinned.
 *
 * Ingestion awaits file reads between writes; a database switch during
 * that window is refused rather than observed.
 */
export async function withDatabaseOperation<T>(
  fn: (services: DatabaseServices) => Promise<T>
): Promise<T> {
  const services = requireDatabase();
  _activeOperations++;
  try {
    const result = await fn(services);
    validateGeneration(services.generation);
    return result;
  } finally {
    _activeOperations--;
  }
}

export function hasDatabase(): boolean {
  return state.currentDatabase !== null;
}

export function getCurrentDatabaseName(): string | null {
  return state.currentDatabaseName;
}

function refuseWhileBusy(action: string): void {
  if (_activeOperations > 0) {
    throw new Error(
      `Cannot ${action} while ${_activeOperations} operation(s) are in-flight. ` +
        `Wait for active operations to complete.`
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Select a database by name. Opens the new connection before closing the
 * old one, except when re-opening the same file.
 *
 * @throws MCPError with DATABASE_NOT_FOUND if the database doesn't exist
 * @throws Error if database operations are in-flight
 */
export function selectDatabase(name: string, storagePath?: string): void {
  const path = storagePath ?? state.config.databasesPath;
  refuseWhileBusy('switch databases');

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  const oldDb = state.currentDatabase;
  const isSameDb = oldDb !== null && state.currentDatabaseName === name;

  if (isSameDb) {
    state.currentDatabase = null;
    state.currentDatabaseName = null;
    oldDb.close();
  }

  const newDb = DatabaseService.open(name, path);

  if (!isSameDb && oldDb) {
    oldDb.close();
  }

  state.currentDatabase = newDb;
  state.currentDatabaseName = name;
  _dbGeneration++;
}

/**
 * Create a new database and optionally select it
 *
 * @throws MCPError with DATABASE_ALREADY_EXISTS if the database exists
 */
export function createDatabase(
  name: string,
  description?: string,
  storagePath?: string,
  autoSelect: boolean = true
): DatabaseService {
  const path = storagePath ?? state.config.databasesPath;

  if (DatabaseService.exists(name, path)) {
    throw databaseAlreadyExistsError(name);
  }

  const db = DatabaseService.create(name, description, path);

  if (autoSelect) {
    if (_activeOperations > 0) {
      db.close();
      refuseWhileBusy(`auto-select newly created database "${name}"`);
    }
    if (state.currentDatabase) {
      state.currentDatabase.close();
    }
    state.currentDatabase = db;
    state.currentDatabaseName = name;
    _dbGeneration++;
  }

  return db;
}

/**
 * Close the current connection.
 *
 * @param forceClose - skip the in-flight guard (tests, process exit)
 */
export function clearDatabase(forceClose: boolean = false): void {
  if (!forceClose) {
    refuseWhileBusy('clear the database');
  }

  if (state.currentDatabase) {
    state.currentDatabase.close();
    state.currentDatabase = null;
    state.currentDatabaseName = null;
    _dbGeneration++;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): PipelineConfig {
  return { ...state.config };
}

export function updateConfig(updates: Partial<PipelineConfig>): void {
  state.config = { ...state.config, ...updates };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  clearDatabase(true);
  _dbGeneration = 0;
  _activeOperations = 0;
  state.config = loadConfig({});
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

process.on('exit', () => {
  if (state.currentDatabase) {
    try {
      state.currentDatabase.close();
    } catch (error) {
      console.error(
        '[state] database close on exit failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    state.currentDatabase = null;
    state.currentDatabaseName = null;
  }
});
