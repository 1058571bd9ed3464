import { RetryConfig } from '../config/environment';
import { StoreUnavailableError } from './errors';
import { logger } from './logger';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Exponential backoff delay for the given zero-based attempt
 */
export function backoffDelay(attempt: number, retry: RetryConfig): number {
  const delay = retry.baseDelayMs * Math.pow(2, attempt);
  return Math.min(delay, retry.maxDelayMs);
}

/**
 * Run a store operation, retrying only on StoreUnavailableError.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withStoreRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  retry: RetryConfig,
  wait: Sleep = sleep
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < retry.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) {
        throw error;
      }
      lastError = error;

      if (attempt < retry.attempts - 1) {
        const delay = backoffDelay(attempt, retry);
        logger.warn(`${operation} failed (attempt ${attempt + 1}/${retry.attempts}), retrying in ${delay}ms`, {
          error: error.message
        });
        await wait(delay);
      }
    }
  }

  throw lastError;
}
