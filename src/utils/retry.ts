import { logger } from './logger';

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** Only errors for which this returns true are retried */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export function calculateBackoff(attempt: number, options: Pick<RetryOptions, 'delayMs' | 'backoffMultiplier' | 'maxDelayMs'>): number {
  const delay = options.delayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run fn, retrying with exponential backoff.
 * The last error is rethrown once attempts are exhausted.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      if (attempt === options.maxAttempts) {
        break;
      }

      const delayMs = calculateBackoff(attempt, options);
      if (options.onRetry) {
        options.onRetry(attempt, error, delayMs);
      } else {
        logger.debug({ attempt, delayMs, err: error }, 'Retrying after error');
      }
      await sleep(delayMs);
    }
  }

  throw lastError;
}
