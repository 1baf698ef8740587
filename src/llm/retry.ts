import { setTimeout as sleep } from "node:timers/promises";

import { MalformedResponseError, TransientServiceError } from "../errors.ts";

export type RetryPolicyOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  backoff?: (attempt: number) => number;
  isRetryable?: (error: unknown) => boolean;
};

export type AttemptContext = {
  attempt: number;
  lastError: unknown;
};

export function isTransientError(err: unknown): boolean {
  return (
    err instanceof TransientServiceError ||
    err instanceof TypeError ||
    (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError"))
  );
}

export function isRetryableAnalysisError(err: unknown): boolean {
  return isTransientError(err) || err instanceof MalformedResponseError;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private backoff: (attempt: number) => number;
  private retryable: (error: unknown) => boolean;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    const baseDelayMs = options.baseDelayMs ?? 1000;
    this.backoff = options.backoff ?? ((attempt) => baseDelayMs * Math.pow(2, attempt - 1));
    this.retryable = options.isRetryable ?? isTransientError;
  }

  static none(): RetryPolicy {
    return new RetryPolicy({ maxAttempts: 1 });
  }

  delayFor(attempt: number): number {
    return Math.max(0, this.backoff(attempt));
  }

  isRetryable(error: unknown): boolean {
    return this.retryable(error);
  }

  /**
   * Runs `fn` until it succeeds, a non-retryable error is thrown, or attempts
   * run out. `onRetry` fires before each backoff sleep.
   */
  async execute<T>(
    fn: (context: AttemptContext) => Promise<T>,
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void,
  ): Promise<T> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await fn({ attempt, lastError });
      } catch (err) {
        lastError = err;
        if (!this.isRetryable(err) || attempt === this.maxAttempts) {
          throw err;
        }
        const delay = this.delayFor(attempt);
        onRetry?.(err, attempt, delay);
        if (delay > 0) {
          await sleep(delay);
        }
      }
    }
    throw lastError;
  }
}
