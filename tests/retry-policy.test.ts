/**
 * Retry policy tests
 */

import { describe, it, expect } from 'vitest';
import { RetryPolicy } from '../src/runtime/retry-policy.js';

describe('RetryPolicy', () => {
  it('should retry forever at a fixed interval by default', () => {
    const policy = RetryPolicy.fixed(5000);

    expect(policy.delayFor(1)).toBe(5000);
    expect(policy.delayFor(50)).toBe(5000);
    expect(policy.isExhausted(1_000_000)).toBe(false);
  });

  it('should double exponential delays up to the cap', () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000, maxAttempts: 10, backoff: 'exponential', maxDelayMs: 5000 });

    expect([1, 2, 3, 4, 5].map((attempt) => policy.delayFor(attempt))).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  it('should give up once the attempt cap is passed', () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000, maxAttempts: 2, backoff: 'fixed', maxDelayMs: 1000 });

    expect(policy.isExhausted(2)).toBe(false);
    expect(policy.isExhausted(3)).toBe(true);
  });
});
