/**
 * Failure digest tests
 */

import { describe, it, expect } from 'vitest';
import { buildErrorDigest } from '../../../src/services/ingestion/error-digest.js';

describe('buildErrorDigest', () => {
  it('is null when nothing failed', () => {
    expect(buildErrorDigest([])).toBeNull();
  });

  it('joins reasons in order', () => {
    expect(buildErrorDigest(['row 1: a', 'row 3: b'])).toBe('row 1: a; row 3: b');
  });

  it('keeps the first reasons and counts the rest', () => {
    const reasons = Array.from({ length: 12 }, (_, i) => `r${i + 1}`);
    expect(buildErrorDigest(reasons)).toBe('r1; r2; r3; r4; r5; r6; r7; r8; r9; r10 (+2 more)');
  });

  it('counts failures beyond the reasons collected', () => {
    expect(buildErrorDigest(['row 1: a'], 5)).toBe('row 1: a (+4 more)');
  });

  it('cuts the digest to the maximum length', () => {
    const digest = buildErrorDigest(['x'.repeat(30)], 1, { limit: 10, maxLength: 20 });
    expect(digest).toBe('x'.repeat(17) + '...');
  });

  it('keeps the dropped count when cutting', () => {
    const digest = buildErrorDigest(['x'.repeat(30), 'y'], 3, { limit: 1, maxLength: 20 });
    expect(digest).toBe('xxxxxxx... (+2 more)');
    expect(digest).toHaveLength(20);
  });
});
