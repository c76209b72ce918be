/**
 * Retry strategy with exponential backoff and jitter
 */

import type { RetryConfig } from '../config/config-schema.js';
import { CancelledError } from '../errors/custom-errors.js';

/**
 * Calculate exponential backoff with jitter
 *
 * @param retryCount - Current retry attempt (0-indexed)
 * @param jitterPercentage - Percentage of jitter (0-100)
 * @returns Delay in milliseconds before next retry
 *
 * @example
 * ```ts
 * // Retry 0: 300ms ± 30ms
 * // Retry 1: 600ms ± 60ms
 * calculateBackoff(0, 300, 2, 10);
 * ```
 */
export function calculateBackoff(
  retryCount: number,
  initialTimeout: number,
  backoffMultiplier: number,
  jitterPercentage: number,
): number {
  const baseDelay = initialTimeout * backoffMultiplier ** retryCount;
  const jitterAmount = (baseDelay * jitterPercentage) / 100;
  const jitter = (Math.random() * 2 - 1) * jitterAmount;

  return Math.floor(Math.max(0, baseDelay + jitter));
}

/**
 * Get the delay before the next retry
 */
export function getRetryDelay(retryCount: number, config: RetryConfig): number {
  return calculateBackoff(retryCount, config.initialTimeout, config.backoffMultiplier, config.jitterPercentage);
}

/**
 * Sleep for a number of milliseconds
 *
 * @throws CancelledError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type RetryOptions = {
  /** Only errors for which this returns true are retried */
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  /** Called before each retry */
  onRetry?: (attempt: number, error: unknown, delay: number) => void;
};

/**
 * Execute a function with retry logic
 *
 * @returns Result of the function
 * @throws The first non-retryable error, or the last one once retries are exhausted
 *
 * @example
 * ```ts
 * await retryWithBackoff(() => source.search(query), retryConfig, {
 *   isRetryable: (error) => error instanceof TransportError && error.isTransient(),
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  options: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      // biome-ignore lint/performance/noAwaitInLoops: Sequential retry is intentional
      return await fn();
    } catch (error) {
      if (attempt >= config.maxRetries || !options.isRetryable(error)) {
        throw error;
      }

      const delay = getRetryDelay(attempt, config);
      options.onRetry?.(attempt + 1, error, delay);

      await sleep(delay, options.signal);
    }
  }
}
