import { logger } from './logger';
import { TimeoutError } from './errors';

/**
 * Request timeout utilities
 * Prevents hung verification requests from stalling a batch
 */

/**
 * Fetch with timeout support
 *
 * @example
 * const response = await fetchWithTimeout('https://api.example.com', {
 *   method: 'GET',
 *   timeout: 5000,
 * });
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number } = {}
): Promise<Response> {
  const { timeout = 30000, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      logger.warn({ url: redactQuery(url), timeout }, 'Fetch request timed out');
      throw new TimeoutError(`Request timed out after ${timeout}ms`, timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Strip the query string so API keys never reach the logs
 */
export function redactQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
