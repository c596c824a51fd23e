// src/util/retry.ts
// What: Explicit retry policy with exponential backoff.
// How: A RetryPolicy holds max attempts, base delay and multiplier; run() keeps the attempt counter and the
//      current delay local to each invocation, so one policy can be shared by concurrent callers.
//      shouldRetry decides which failures are transient; anything else is rethrown at once.

import type { Logger } from 'pino';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier?: number;
  shouldRetry?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly multiplier: number;
  private readonly shouldRetry: (err: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: RetryOptions) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${opts.maxAttempts}`);
    }
    this.maxAttempts = opts.maxAttempts;
    this.baseDelayMs = Math.max(0, opts.baseDelayMs);
    this.multiplier = opts.multiplier ?? 2;
    this.shouldRetry = opts.shouldRetry ?? (() => true);
    this.sleep = opts.sleep ?? sleep;
  }

  /** Delay before the retry that follows failed attempt number `attempt` (1-based). */
  delayAfter(attempt: number): number {
    return this.baseDelayMs * Math.pow(this.multiplier, attempt - 1);
  }

  async run<T>(operation: string, fn: (attempt: number) => Promise<T>, log?: Logger): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        if (attempt >= this.maxAttempts || !this.shouldRetry(err)) {
          if (attempt > 1) {
            log?.error({ err, operation, attempts: attempt }, 'Giving up after retries');
          }
          throw err;
        }
        const delayMs = this.delayAfter(attempt);
        log?.warn({ err, operation, attempt, delayMs }, 'Attempt failed; retrying');
        await this.sleep(delayMs);
      }
    }
  }

  with(overrides: Partial<RetryOptions>): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      multiplier: this.multiplier,
      shouldRetry: this.shouldRetry,
      sleep: this.sleep,
      ...overrides,
    });
  }
}
