/**
 * Email Finder Module
 *
 * - Name / domain normalization
 * - Ordered pattern-based candidate generation
 * - Early-stopping verification against an external oracle
 * - Bounded-concurrency batch runs with efficiency accounting
 */

// Main finder
export { findEmail, verifyCandidates, callsSaved, type VerifyOptions } from './engine';

// Batch
export {
  findEmailsBatch,
  summarizeOutcomes,
  type BatchOptions,
  type BatchProgress,
  type BatchReport,
  type BatchSummary,
} from './batch';

// Normalization
export { normalizeName, normalizeDomain, cleanName } from './normalize';

// Pattern generation
export {
  PATTERN_RULES,
  generateEmailCandidates,
  generateEmails,
  applyPattern,
  type PatternRule,
} from './patterns';

// Verification service
export { createReoonOracle, getDefaultOracle, getConfiguredServices, type ReoonOracleOptions } from './services';

export type {
  ParsedName,
  NameParts,
  EmailCandidate,
  ContactInput,
  EmailOracle,
  OracleVerdict,
  OracleRequestOptions,
  OracleResponse,
  VerificationOutcome,
} from './types';
