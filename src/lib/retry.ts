import { logger } from './logger';
import { HttpStatusError, getErrorMessage } from './errors';
import type { SlotLimiter } from './rate-limiter';

/**
 * Retry with exponential backoff for calls to the verification provider
 */

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  attempts?: number;
  /** Delay before the first retry in ms, doubled after each one (default: 1000) */
  delay?: number;
  /** Whether an error is worth another attempt (default: always) */
  isRetryable?: (error: unknown) => boolean;
}

export interface RetryFetchOptions extends RetryOptions {
  /**
   * Slot taken before every retried request. The caller paces the first
   * request itself.
   */
  limiter?: SlotLimiter;
}

export const retryable = {
  networkErrors: (error: unknown): boolean =>
    error instanceof Error &&
    ['fetch failed', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND'].some(code => error.message.includes(code)),

  /** Rate limited (429) or server error (5xx) */
  httpStatus: (status: number): boolean => status === 429 || (status >= 500 && status < 600),
};

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Up to 10% jitter so parallel lookups do not retry in lockstep
function backoffDelay(baseDelay: number, attempt: number): number {
  const exponential = baseDelay * 2 ** (attempt - 1);
  return exponential + Math.random() * 0.1 * exponential;
}

export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelay = options.delay ?? 1000;
  const isRetryable = options.isRetryable ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        throw error;
      }

      const delay = backoffDelay(baseDelay, attempt);
      logger.warn({ attempt, maxAttempts: attempts, delay, error: getErrorMessage(error) }, 'Retrying operation');
      await sleep(delay);
    }
  }
}

/**
 * Run a fetch-producing request, retrying network errors and 429/5xx
 * responses. The last retryable response is thrown as an HttpStatusError.
 */
export async function retryFetch(
  request: () => Promise<Response>,
  options: RetryFetchOptions = {}
): Promise<Response> {
  const { limiter, ...retryOptions } = options;

  return retry(
    async (attempt) => {
      if (attempt > 1 && limiter) {
        await limiter.acquire();
      }

      const response = await request();

      if (retryable.httpStatus(response.status)) {
        throw new HttpStatusError(response.status, response.statusText);
      }

      return response;
    },
    {
      isRetryable: (error) =>
        retryable.networkErrors(error) ||
        (error instanceof HttpStatusError && retryable.httpStatus(error.status)),
      ...retryOptions,
    }
  );
}
