/**
 * Bulk email finding
 *
 * Rows are independent, so they run through a bounded worker pool. All rows
 * share one rate limiter, which keeps the aggregate request rate under the
 * provider's limit while each row keeps its own inter-candidate delay.
 */

import pLimit from 'p-limit';
import { log } from '../../logger';
import { config } from '../../config';
import { BATCH, OUTCOME_STATUS } from '../../constants';
import { RateLimiter } from '../../rate-limiter';
import { findEmail, type VerifyOptions } from './engine';
import type { ContactInput, EmailOracle, VerificationOutcome } from './types';

export interface BatchProgress {
  completed: number;
  total: number;
  found: number;
  oracleCalls: number;
  outcome: VerificationOutcome;
}

export interface BatchOptions extends VerifyOptions {
  /** Rows processed at once (default: config, max 5) */
  concurrency?: number;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchSummary {
  totalRows: number;
  found: number;
  notFound: number;
  invalid: number;
  /** Percentage of rows with an accepted email */
  successRate: number;
  totalOracleCalls: number;
  avgCallsPerPerson: number;
  /** Percentage of found emails accepted on the first candidate */
  firstAttemptSuccessRate: number;
  avgAttemptsToFind: number;
  /** attemptIndex → number of rows found on that attempt */
  attemptsHistogram: Record<number, number>;
  callsSaved: number;
  /** callsSaved as a percentage of all candidates generated */
  savedPercent: number;
}

export interface BatchReport {
  outcomes: VerificationOutcome[];
  summary: BatchSummary;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? round1((part / whole) * 100) : 0;
}

export function summarizeOutcomes(outcomes: readonly VerificationOutcome[]): BatchSummary {
  const totalRows = outcomes.length;
  const foundOutcomes = outcomes.filter(o => o.email !== null);
  const invalid = outcomes.filter(o =>
    o.status === OUTCOME_STATUS.INVALID_DOMAIN || o.status === OUTCOME_STATUS.INVALID_NAMES
  ).length;

  let totalOracleCalls = 0;
  let totalCandidates = 0;
  for (const outcome of outcomes) {
    totalOracleCalls += outcome.candidatesTried.length;
    totalCandidates += outcome.candidatesTotal;
  }

  const attemptsHistogram: Record<number, number> = {};
  let attemptSum = 0;
  let firstAttempt = 0;
  for (const outcome of foundOutcomes) {
    const attempt = outcome.attemptIndex ?? 0;
    attemptsHistogram[attempt] = (attemptsHistogram[attempt] ?? 0) + 1;
    attemptSum += attempt;
    if (attempt === 1) firstAttempt++;
  }

  const callsSaved = totalCandidates - totalOracleCalls;

  return {
    totalRows,
    found: foundOutcomes.length,
    notFound: totalRows - foundOutcomes.length - invalid,
    invalid,
    successRate: percent(foundOutcomes.length, totalRows),
    totalOracleCalls,
    avgCallsPerPerson: totalRows > 0 ? round1(totalOracleCalls / totalRows) : 0,
    firstAttemptSuccessRate: percent(firstAttempt, foundOutcomes.length),
    avgAttemptsToFind: foundOutcomes.length > 0 ? round1(attemptSum / foundOutcomes.length) : 0,
    attemptsHistogram,
    callsSaved,
    savedPercent: percent(callsSaved, totalCandidates),
  };
}

// Non-numeric input (e.g. a bad CLI flag) falls back to the configured default
function resolveConcurrency(requested: number | undefined): number {
  const value = requested !== undefined && Number.isFinite(requested)
    ? Math.floor(requested)
    : config.batch.concurrency;
  return Math.min(Math.max(value, 1), BATCH.MAX_CONCURRENCY);
}

/**
 * Find emails for many contacts. Outcomes keep the input order.
 */
export async function findEmailsBatch(
  contacts: readonly ContactInput[],
  oracle: EmailOracle,
  options: BatchOptions = {}
): Promise<BatchReport> {
  const { concurrency: requested, onProgress, ...verifyOptions } = options;
  const concurrency = resolveConcurrency(requested);
  const limiter = verifyOptions.limiter ?? new RateLimiter({ minIntervalMs: config.verifier.minIntervalMs });
  const limit = pLimit(concurrency);

  log.batch('started', { rows: contacts.length, concurrency, oracle: oracle.name });

  let completed = 0;
  let found = 0;
  let oracleCalls = 0;

  const outcomes = await Promise.all(
    contacts.map(contact =>
      limit(async () => {
        const outcome = await findEmail(contact, oracle, { ...verifyOptions, limiter });

        completed++;
        oracleCalls += outcome.candidatesTried.length;
        if (outcome.email) found++;
        onProgress?.({ completed, total: contacts.length, found, oracleCalls, outcome });

        return outcome;
      })
    )
  );

  const summary = summarizeOutcomes(outcomes);
  log.batch('completed', {
    ...summary,
    limiter: limiter instanceof RateLimiter ? limiter.getStats() : undefined,
  });

  return { outcomes, summary };
}
