/**
 * Centralized constants
 * Eliminates magic numbers and strings throughout the codebase
 */

// ============================================
// TIMEOUTS (in milliseconds)
// ============================================
export const TIMEOUTS = {
  /** Single verification request */
  VERIFIER: 30000,
} as const;

// ============================================
// VERIFICATION
// ============================================
export const VERIFICATION = {
  /** Pause between two probes of the same person */
  INTER_REQUEST_DELAY_MS: 300,
  /** Minimum gap between any two oracle calls across a batch */
  MIN_INTERVAL_MS: 300,
  /** Attempts per candidate for retryable transport failures */
  RETRY_ATTEMPTS: 2,
  /** Base backoff between those attempts */
  RETRY_DELAY_MS: 500,
  /** Oracle statuses that disqualify a candidate */
  FORBIDDEN_STATUSES: ['invalid', 'disabled', 'unknown'] as const,
} as const;

// ============================================
// OUTCOME STATUSES
// ============================================
export const OUTCOME_STATUS = {
  NOT_FOUND: 'not_found',
  INVALID_DOMAIN: 'invalid_domain',
  INVALID_NAMES: 'invalid_names',
} as const;

// ============================================
// BATCH
// ============================================
export const BATCH = {
  DEFAULT_CONCURRENCY: 1,
  MAX_CONCURRENCY: 5,
  /** Rows accepted by one CSV upload */
  MAX_ROWS: 5000,
  /** Contacts accepted by one JSON batch request */
  MAX_JSON_CONTACTS: 50,
  /** Sample size for column content analysis */
  COLUMN_SAMPLE_SIZE: 50,
} as const;
