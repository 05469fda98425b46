import { describe, expect, test } from 'vitest';
import { generateShortUid } from '../../src/utils/uid';

describe('generateShortUid', () => {
  test('should produce 12 url-safe characters', () => {
    expect(generateShortUid()).toMatch(/^[A-Za-z0-9_-]{12}$/);
  });

  test('should not repeat across calls', () => {
    const uids = new Set(Array.from({ length: 50 }, () => generateShortUid()));
    expect(uids.size).toBe(50);
  });
});
