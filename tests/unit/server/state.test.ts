/**
 * Server state tests: database selection and configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  state,
  createDatabase,
  selectDatabase,
  clearDatabase,
  requireDatabase,
  validateGeneration,
  withDatabaseOperation,
  hasDatabase,
  getCurrentDatabaseName,
  getConfig,
  updateConfig,
  resetState,
} from '../../../src/server/state.js';
import { MCPError } from '../../../src/server/errors.js';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { createTestDir, cleanupTestDir } from '../database/helpers.js';

describe('server state', () => {
  let testDir: string;

  beforeEach(() => {
    resetState();
    testDir = createTestDir('state-');
    updateConfig({ databasesPath: testDir });
  });

  afterEach(() => {
    resetState();
    cleanupTestDir(testDir);
  });

  it('requires a selected database', () => {
    expect(hasDatabase()).toBe(false);
    try {
      requireDatabase();
      expect.unreachable('requireDatabase should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MCPError);
      expect(error).toMatchObject({ category: 'DATABASE_NOT_SELECTED' });
    }
  });

  it('creates and auto-selects a database under the configured folder', () => {
    const db = createDatabase('plant_a');

    expect(getCurrentDatabaseName()).toBe('plant_a');
    expect(requireDatabase().db).toBe(db);
    expect(DatabaseService.exists('plant_a', testDir)).toBe(true);
  });

  it('refuses to create a database twice', () => {
    createDatabase('plant_a');
    expect(() => createDatabase('plant_a')).toThrow('Database "plant_a" already exists');
  });

  it('switches databases and closes the previous connection', () => {
    const first = createDatabase('plant_a');
    createDatabase('plant_b', undefined, undefined, false).close();

    selectDatabase('plant_b');

    expect(first.isOpen()).toBe(false);
    expect(getCurrentDatabaseName()).toBe('plant_b');
  });

  it('reports unknown databases', () => {
    try {
      selectDatabase('missing');
      expect.unreachable('selectDatabase should have thrown');
    } catch (error) {
      expect(error).toMatchObject({ category: 'DATABASE_NOT_FOUND' });
    }
  });

  it('detects a database switch during an operation', () => {
    createDatabase('plant_a');
    const { generation } = requireDatabase();
    clearDatabase();

    expect(() => validateGeneration(generation)).toThrow();
  });

  it('refuses to switch while an operation is in flight', async () => {
    createDatabase('plant_a');

    await withDatabaseOperation(async () => {
      expect(() => clearDatabase()).toThrow(/operation\(s\) are in-flight/);
    });

    clearDatabase();
    expect(hasDatabase()).toBe(false);
  });

  it('hands out configuration copies', () => {
    const config = getConfig();
    config.maxConcurrent = 99;

    expect(state.config.maxConcurrent).toBe(4);
    updateConfig({ maxConcurrent: 2 });
    expect(getConfig().maxConcurrent).toBe(2);
  });
});
