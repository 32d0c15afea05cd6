/**
 * Retry with exponential backoff, and polite pacing between calls.
 *
 * These are two separate timers:
 *   - RetryExecutor waits between attempts of one failed call:
 *     delay = min(initial * multiplier^(attempt-1), max) + random * jitter
 *   - Pacer enforces a minimum gap after each successful call, so a run of
 *     successes does not trip upstream rate limits.
 */

import type { RetryPolicy } from "../config/harvest/index.js";
import { isRetryableSourceError } from "./errors.js";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RetryAttempt {
  readonly attemptNumber: number;
  /** Wait scheduled after this attempt; 0 for the final one */
  readonly delayMs: number;
  readonly error: Error;
  readonly retryable: boolean;
}

/**
 * Thrown once the attempt cap is reached, or at the first non-retryable
 * failure.
 */
export class RetryExhaustedError extends Error {
  readonly label: string;
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(label: string, attempts: readonly RetryAttempt[], lastError: Error) {
    super(`${label} failed after ${attempts.length} attempt(s): ${lastError.message}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
    this.label = label;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export interface RetryExecutorOptions {
  sleep?: Sleep;
  /** Source of randomness in [0, 1) for jitter */
  random?: () => number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (label: string, attempt: RetryAttempt) => void;
}

export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly onRetry?: (label: string, attempt: RetryAttempt) => void;

  constructor(policy: RetryPolicy, options: RetryExecutorOptions = {}) {
    this.policy = policy;
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.isRetryable = options.isRetryable ?? isRetryableSourceError;
    this.onRetry = options.onRetry;
  }

  async execute<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        const retryable = this.isRetryable(err);
        const last = !retryable || attempt >= this.policy.maxAttempts;
        const record: RetryAttempt = {
          attemptNumber: attempt,
          delayMs: last ? 0 : this.delayFor(attempt),
          error,
          retryable,
        };
        attempts.push(record);

        if (last) {
          throw new RetryExhaustedError(label, attempts, error);
        }
        this.onRetry?.(label, record);
        await this.sleep(record.delayMs);
      }
    }
  }

  /**
   * Backoff before the retry that follows `attempt` (1-based).
   */
  delayFor(attempt: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs, jitterMs } = this.policy;
    const exponential = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    const capped = Math.min(exponential, maxDelayMs);
    return Math.floor(capped + this.random() * jitterMs);
  }
}

export interface PacerOptions {
  sleep?: Sleep;
  now?: () => number;
}

export class Pacer {
  private readonly intervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private lastSuccessAt: number | null = null;

  constructor(intervalMs: number, options: PacerOptions = {}) {
    this.intervalMs = intervalMs;
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Wait until the interval since the last successful call has elapsed.
   */
  async wait(): Promise<void> {
    if (this.lastSuccessAt === null || this.intervalMs === 0) {
      return;
    }
    const remaining = this.lastSuccessAt + this.intervalMs - this.now();
    if (remaining > 0) {
      await this.sleep(remaining);
    }
  }

  markSuccess(): void {
    this.lastSuccessAt = this.now();
  }
}

/**
 * Paced, retried external call: wait for pacing, run with backoff, and
 * restart the pacing clock only when the call succeeds.
 */
export class CallGate {
  constructor(
    private readonly retry: RetryExecutor,
    private readonly pacer: Pacer
  ) {}

  async run<T>(label: string, fn: () => Promise<T>): Promise<T> {
    await this.pacer.wait();
    const result = await this.retry.execute(label, fn);
    this.pacer.markSuccess();
    return result;
  }
}
