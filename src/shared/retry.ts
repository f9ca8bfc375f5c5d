import { getLogger } from './logger.js';

const log = getLogger('auth', { component: 'retry' });

export interface RetryOptions {
  /** Attempts including the first call. Default: 3 */
  maxAttempts?: number;
  /** Wait before the first retry; doubles after every further failure. Default: 1000 */
  baseDelayMs?: number;
  /**
   * Error codes that may be retried. Anything else, or any error when the
   * list is empty, is thrown at once.
   */
  retryableErrors?: readonly string[];
  /** Runs before the wait of each retry. */
  onRetry?: (error: Error, attempt: number) => void | Promise<void>;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Calls `fn` until it resolves or the attempts run out, backing off
 * exponentially between attempts. `fn` receives the 1-based attempt number.
 * The error of the last attempt is rethrown as is.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const { maxAttempts = 3, baseDelayMs = 1000, retryableErrors = [], onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const code = errorCode(error);
      if (attempt >= maxAttempts || code === undefined || !retryableErrors.includes(code)) {
        throw error;
      }

      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      log.warn({ attempt, maxAttempts, delayMs, code }, `Retry attempt ${attempt}/${maxAttempts}`);

      if (onRetry) {
        await onRetry(error instanceof Error ? error : new Error(String(error)), attempt);
      }
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
