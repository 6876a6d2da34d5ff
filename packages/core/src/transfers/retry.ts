import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Exponential backoff with full jitter:
 *   delay = random() * min(maxDelay, baseDelay * 2^(attempt - 1))
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const cap = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.random() * cap;
}

/**
 * Run an operation until it succeeds, the error is not retryable, or the
 * attempts run out. The last error is rethrown.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err: unknown) {
      const retryable = options.shouldRetry?.(err) ?? true;
      if (!retryable || attempt >= options.attempts) {
        throw err;
      }
      options.onRetry?.(err, attempt);
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
