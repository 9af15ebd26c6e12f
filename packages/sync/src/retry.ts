import { isCancellation, isTransientError } from '@catalog-sync/core';
import { sleep } from './abort.js';

/**
 * Retry policy for network-bound sync steps
 */
export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry (default: 1000ms) */
  initialDelayMs?: number;
  /** Upper bound for any single delay (default: 30000ms) */
  maxDelayMs?: number;
}

export interface RetryOptions extends RetryPolicy {
  signal?: AbortSignal;
  /**
   * Called before each retry with the 1-based number of the attempt about
   * to run and the attempt limit
   */
  onRetry?: (attempt: number, maxAttempts: number, delayMs: number, error: unknown) => void;
  /** Which failures are worth another attempt (default: {@link isTransientError}) */
  shouldRetry?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: Required<RetryPolicy> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Delay before retry number `retry` (1 for the first retry):
 * `initialDelayMs * 2^(retry - 1)`, capped at `maxDelayMs`.
 */
export function computeBackoffDelay(retry: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(initialDelayMs * Math.pow(2, retry - 1), maxDelayMs);
}

/**
 * Run `operation`, retrying transient failures with capped exponential
 * backoff. Cancellation is never retried, and the last error is rethrown
 * once `maxAttempts` is reached.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts;
  const initialDelayMs = options.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs;
  const shouldRetry = options.shouldRetry ?? isTransientError;

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      if (isCancellation(error) || options.signal?.aborted) throw error;
      if (attempt >= maxAttempts || !shouldRetry(error)) throw error;

      const delayMs = computeBackoffDelay(attempt, initialDelayMs, maxDelayMs);
      options.onRetry?.(attempt + 1, maxAttempts, delayMs, error);
      await sleep(delayMs, options.signal);
    }
  }
}
