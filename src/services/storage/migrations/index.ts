/**
 * Database Schema Migrations
 *
 * Handles SQLite schema initialization, version checks and verification.
 *
 * @module migrations
 */

export {
  MigrationError,
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  configurePragmas,
} from './operations.js';

export { verifySchema } from './verification.js';
