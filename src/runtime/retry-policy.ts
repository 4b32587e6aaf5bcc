/**
 * @fileoverview Retry pacing for failed store reads
 * @module runtime/retry-policy
 *
 * The default policy retries forever at the poll interval with no backoff.
 * A bounded or exponential policy can be configured for environments where
 * an unreachable store should eventually stop the process.
 */

import type { BackoffStrategy } from './types.js';

export interface RetryPolicyOptions {
  /** Delay after the first failure, normally the poll interval */
  readonly baseDelayMs: number;
  /** Consecutive failures tolerated; `Infinity` never gives up */
  readonly maxAttempts: number;
  readonly backoff: BackoffStrategy;
  /** Cap for exponential delays */
  readonly maxDelayMs: number;
}

export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {}

  /**
   * Unbounded retries at a fixed interval
   */
  static fixed(intervalMs: number): RetryPolicy {
    return new RetryPolicy({
      baseDelayMs: intervalMs,
      maxAttempts: Number.POSITIVE_INFINITY,
      backoff: 'fixed',
      maxDelayMs: intervalMs,
    });
  }

  /**
   * Delay before the next read after `attempt` consecutive failures (1-based)
   */
  delayFor(attempt: number): number {
    if (this.options.backoff === 'fixed') {
      return this.options.baseDelayMs;
    }
    const exponent = Math.max(0, attempt - 1);
    const delay = this.options.baseDelayMs * 2 ** exponent;
    return Math.min(delay, Math.max(this.options.maxDelayMs, this.options.baseDelayMs));
  }

  /**
   * Whether the loop should give up after `attempt` consecutive failures
   */
  isExhausted(attempt: number): boolean {
    return attempt > this.options.maxAttempts;
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }
}
