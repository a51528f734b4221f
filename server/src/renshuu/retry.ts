/**
 * Retry Logic with Exponential Backoff
 *
 * Retries idempotent Renshuu reads on transient failures
 * (network errors, timeouts, 5xx and 429 answers).
 */

import { isRetryableError } from '../errors';
import { logger } from '../utils/logger';
import { OPERATIONS } from '../utils/logger-standards';

export interface RetryOptions {
  /**
   * Maximum number of retry attempts
   * Default: 3
   */
  maxRetries?: number;

  /**
   * Initial delay in ms before first retry
   * Default: 500
   */
  initialDelay?: number;

  /**
   * Maximum delay in ms between retries
   * Default: 5000
   */
  maxDelay?: number;

  /**
   * Backoff multiplier for exponential backoff
   * Default: 2
   */
  backoffMultiplier?: number;

  /**
   * Custom function to determine if error is retryable
   * Default: uses isRetryableError
   */
  isRetryable?: (error: unknown) => boolean;

  /**
   * Callback on each retry attempt
   */
  onRetry?: (error: Error, attempt: number, nextDelay: number) => void;

  /**
   * Wait implementation, replaceable in tests
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Execute a function with retry logic
 *
 * @param fn - Async function to execute
 * @returns Promise resolving to function result
 * @throws Last error if all retries exhausted
 *
 * @example
 * ```typescript
 * const lists = await retry(() => api.getLists(), { maxRetries: 2 });
 * ```
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 500,
    maxDelay = 5000,
    backoffMultiplier = 2,
    isRetryable = isRetryableError,
    onRetry,
    sleep = defaultSleep,
  } = options;

  let lastError: Error | undefined;
  let delay = initialDelay;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const shouldRetry = attempt < maxRetries && isRetryable(error);

      if (!shouldRetry) {
        throw error;
      }

      const nextDelay = Math.min(delay, maxDelay);

      if (onRetry) {
        onRetry(lastError, attempt + 1, nextDelay);
      }

      logger.warn('Renshuu call failed, retrying...', {
        operation: OPERATIONS.API_RETRY,
        attempt: attempt + 1,
        maxRetries,
        nextDelayMs: nextDelay,
        error: lastError.message,
      });

      await sleep(nextDelay);

      delay = delay * backoffMultiplier;
    }
  }

  // All retries exhausted
  throw lastError || new Error('Unknown error during retry');
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
