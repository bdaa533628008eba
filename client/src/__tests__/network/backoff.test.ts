import { describe, it, expect } from 'vitest';
import { DEFAULT_BACKOFF, backoffDelay } from '../../network/backoff.js';

describe('backoffDelay', () => {
  it('doubles from one second by default', () => {
    expect([1, 2, 3, 4, 5].map((n) => backoffDelay(n))).toEqual([1000, 2000, 4000, 8000, 16_000]);
  });

  it('caps at the policy maximum', () => {
    expect(backoffDelay(6)).toBe(30_000);
    expect(backoffDelay(20)).toBe(DEFAULT_BACKOFF.maxMs);
  });

  it('treats attempt 0 like the first attempt', () => {
    expect(backoffDelay(0)).toBe(1000);
  });

  it('follows a custom policy', () => {
    const policy = { baseMs: 50, factor: 3, maxMs: 400, maxAttempts: 4 };
    expect([1, 2, 3].map((n) => backoffDelay(n, policy))).toEqual([50, 150, 400]);
  });
});
