/**
 * Environment configuration tests
 */

import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import {
  loadConfig,
  ConfigurationError,
  DEFAULT_DATABASES_PATH,
} from '../../../src/utils/config.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      databasesPath: resolve(DEFAULT_DATABASES_PATH),
      rawDataPath: resolve('./data/raw'),
      maxConcurrent: 4,
      errorDigestLimit: 10,
      errorDigestMaxLength: 2000,
      minTextFields: 3,
      minTextLength: 50,
      skipKnownDocuments: false,
    });
  });

  it('reads and coerces COMPLIANCE_INGEST_* variables', () => {
    const config = loadConfig({
      COMPLIANCE_INGEST_DATABASES_PATH: '/srv/compliance/db',
      COMPLIANCE_INGEST_MAX_CONCURRENT: '8',
      COMPLIANCE_INGEST_ERROR_DIGEST_LIMIT: ' 5 ',
      COMPLIANCE_INGEST_SKIP_KNOWN_DOCUMENTS: 'yes',
    });

    expect(config.databasesPath).toBe('/srv/compliance/db');
    expect(config.maxConcurrent).toBe(8);
    expect(config.errorDigestLimit).toBe(5);
    expect(config.skipKnownDocuments).toBe(true);
  });

  it('treats empty strings as unset and ignores unrelated variables', () => {
    const config = loadConfig({
      COMPLIANCE_INGEST_MAX_CONCURRENT: '',
      PATH: '/usr/bin',
    });
    expect(config.maxConcurrent).toBe(4);
  });

  it('fails with every invalid value listed', () => {
    try {
      loadConfig({
        COMPLIANCE_INGEST_MAX_CONCURRENT: '0',
        COMPLIANCE_INGEST_SKIP_KNOWN_DOCUMENTS: 'maybe',
      });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^COMPLIANCE_INGEST_MAX_CONCURRENT: /);
        expect(error.issues[1]).toMatch(/^COMPLIANCE_INGEST_SKIP_KNOWN_DOCUMENTS: /);
        expect(error.message).toMatch(/^Invalid configuration: /);
      }
    }
  });
});
