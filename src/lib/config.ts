/**
 * Centralized configuration management
 * - Single source of truth for all environment variables
 * - Values are read lazily so tests and scripts can set env before use
 */

import { VERIFICATION, BATCH, TIMEOUTS } from './constants';

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string, defaultValue: readonly string[]): string[] {
  const value = process.env[key];
  if (!value) return [...defaultValue];
  const items = value
    .split(',')
    .map(item => item.trim().toLowerCase())
    .filter(Boolean);
  return items.length > 0 ? items : [...defaultValue];
}

export type ReoonMode = 'power' | 'quick';

export const config = {
  // Environment
  get isDev() { return process.env.NODE_ENV === 'development'; },

  // Reoon email verifier
  reoon: {
    get apiKey() { return getEnvOptional('REOON_API_KEY'); },
    get mode(): ReoonMode {
      return getEnv('REOON_MODE', 'power') === 'quick' ? 'quick' : 'power';
    },
    get baseUrl() {
      return getEnv('VERIFIER_BASE_URL', 'https://emailverifier.reoon.com/api/v1/verify');
    },
    get isConfigured() { return !!this.apiKey; },
  },

  // Probe loop
  verifier: {
    get delayMs() { return getEnvNumber('VERIFIER_DELAY_MS', VERIFICATION.INTER_REQUEST_DELAY_MS); },
    get minIntervalMs() { return getEnvNumber('VERIFIER_MIN_INTERVAL_MS', VERIFICATION.MIN_INTERVAL_MS); },
    get timeoutMs() { return getEnvNumber('VERIFIER_TIMEOUT_MS', TIMEOUTS.VERIFIER); },
    get retryAttempts() { return getEnvNumber('VERIFIER_RETRY_ATTEMPTS', VERIFICATION.RETRY_ATTEMPTS); },
    get forbiddenStatuses() {
      return getEnvList('VERIFIER_FORBIDDEN_STATUSES', VERIFICATION.FORBIDDEN_STATUSES);
    },
  },

  // Batch processing
  batch: {
    get concurrency() {
      return Math.min(Math.max(getEnvNumber('BATCH_CONCURRENCY', BATCH.DEFAULT_CONCURRENCY), 1), BATCH.MAX_CONCURRENCY);
    },
    get maxRows() { return getEnvNumber('BATCH_MAX_ROWS', BATCH.MAX_ROWS); },
  },

  // Security
  security: {
    get strictErrors() { return getEnvBoolean('STRICT_ERROR_HANDLING', true); },
  },
} as const;

export default config;
