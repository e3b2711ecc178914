/**
 * Tool response formatting tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatResponse } from '../../../src/tools/shared.js';
import { successResult } from '../../../src/server/types.js';

function documents(count: number): Array<{ file_name: string; status: string; error_summary: string }> {
  return Array.from({ length: count }, (_, i) => ({
    file_name: `inspections-${i}.csv`,
    status: 'PARTIAL',
    error_summary: `row ${i + 1}: Missing required field 'site'`.padEnd(120, '.'),
  }));
}

function parseText(text: string): { success: boolean; data: Record<string, unknown> } {
  return JSON.parse(text);
}

describe('formatResponse', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('serializes results under the size limit unchanged', () => {
    const result = successResult({ files_found: 2, documents: documents(2) });
    expect(formatResponse(result)).toEqual({
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    });
  });

  it('halves the largest list until the response fits and notes the cut', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const result = successResult({
      directory_path: '/srv/inbox',
      documents: documents(16),
      errors: ['scan.txt: EMPTY_DOCUMENT'],
    });

    const response = formatResponse(result, 1500);
    const text = response.content[0].text;
    const parsed = parseText(text);
    const kept = parsed.data.documents;

    expect(text.length).toBeLessThanOrEqual(1500);
    expect(Array.isArray(kept)).toBe(true);
    if (Array.isArray(kept)) {
      expect(kept.length).toBeLessThan(16);
      expect(parsed.data.response_truncated).toMatchObject({
        lists: { documents: { shown: kept.length, total: 16 } },
      });
    }
    expect(parsed.data.errors).toEqual(['scan.txt: EMPTY_DOCUMENT']);
    expect(parsed.data.directory_path).toBe('/srv/inbox');
  });

  it('leaves oversized results without a data payload as they are', () => {
    const result = { message: 'x'.repeat(200) };
    expect(formatResponse(result, 50).content[0].text).toBe(JSON.stringify(result, null, 2));
  });
});
