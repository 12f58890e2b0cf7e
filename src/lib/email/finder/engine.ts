/**
 * Email Finder Engine
 *
 * Probes candidate addresses against the verification oracle in pattern
 * order and stops at the first one the oracle does not reject.
 *
 * Never throws: bad input comes back as an `invalid_*` outcome and a failed
 * oracle call only skips that candidate.
 */

import { logger } from '../../logger';
import { config } from '../../config';
import { OUTCOME_STATUS } from '../../constants';
import { getErrorMessage } from '../../errors';
import { isErr } from '../../result';
import { sleep as defaultSleep } from '../../retry';
import type { SlotLimiter } from '../../rate-limiter';
import { normalizeDomain, normalizeName } from './normalize';
import { generateEmails } from './patterns';
import type { ContactInput, EmailOracle, ParsedName, VerificationOutcome } from './types';

export interface VerifyOptions {
  /** Pause after a rejected candidate before the next one (default: config) */
  delayMs?: number;
  /** Oracle statuses that reject a candidate (default: invalid, disabled, unknown) */
  forbiddenStatuses?: readonly string[];
  /** Shared limiter when several lookups run at once */
  limiter?: SlotLimiter;
  sleep?: (ms: number) => Promise<void>;
}

interface Identity {
  firstName: string;
  lastName: string;
  fullName: string;
}

interface OutcomeFields {
  email: string | null;
  status: string;
  candidatesTried: readonly string[];
  candidatesTotal: number;
  attemptIndex: number | null;
}

function buildOutcome(
  identity: Identity,
  domain: string,
  fields: OutcomeFields,
  startTime: number
): VerificationOutcome {
  return Object.freeze({
    ...identity,
    domain,
    email: fields.email,
    status: fields.status,
    candidatesTried: Object.freeze([...fields.candidatesTried]),
    candidatesTotal: fields.candidatesTotal,
    attemptIndex: fields.attemptIndex,
    durationMs: Date.now() - startTime,
  });
}

function identityFromName(name: ParsedName | null): Identity {
  const firstName = name?.first ?? '';
  const lastName = name?.last ?? '';
  return { firstName, lastName, fullName: `${firstName} ${lastName}`.trim() };
}

/**
 * Send one candidate to the oracle. Returns the reported status, or null on
 * any transport failure.
 */
async function probe(oracle: EmailOracle, email: string, limiter?: SlotLimiter): Promise<string | null> {
  try {
    const response = await oracle.verify(email, { limiter });

    if (isErr(response)) {
      logger.warn({
        email,
        oracle: oracle.name,
        kind: response.error.kind,
        error: response.error.message,
      }, 'Verification request failed, trying next candidate');
      return null;
    }

    return response.data.status;
  } catch (error) {
    logger.warn({
      email,
      oracle: oracle.name,
      error: getErrorMessage(error),
    }, 'Verification request threw, trying next candidate');
    return null;
  }
}

/**
 * Probe the candidates for an already-normalized name and domain
 */
export async function verifyCandidates(
  name: ParsedName | null,
  domain: string,
  oracle: EmailOracle,
  options: VerifyOptions = {},
  identity: Identity = identityFromName(name)
): Promise<VerificationOutcome> {
  const startTime = Date.now();
  const delayMs = options.delayMs ?? config.verifier.delayMs;
  const forbidden = new Set(
    (options.forbiddenStatuses ?? config.verifier.forbiddenStatuses).map(s => s.toLowerCase())
  );
  const wait = options.sleep ?? defaultSleep;

  if (!domain) {
    return buildOutcome(identity, domain, {
      email: null,
      status: OUTCOME_STATUS.INVALID_DOMAIN,
      candidatesTried: [],
      candidatesTotal: 0,
      attemptIndex: null,
    }, startTime);
  }

  if (!name) {
    return buildOutcome(identity, domain, {
      email: null,
      status: OUTCOME_STATUS.INVALID_NAMES,
      candidatesTried: [],
      candidatesTotal: 0,
      attemptIndex: null,
    }, startTime);
  }

  const candidates = generateEmails({ ...name, domain });
  const tried: string[] = [];

  for (let i = 0; i < candidates.length; i++) {
    const email = candidates[i];

    if (options.limiter) {
      await options.limiter.acquire();
    }

    tried.push(email);
    const status = await probe(oracle, email, options.limiter);

    if (status !== null && !forbidden.has(status.toLowerCase())) {
      logger.debug({ email, status, attempt: tried.length, total: candidates.length }, 'Candidate accepted');

      return buildOutcome(identity, domain, {
        email,
        status,
        candidatesTried: tried,
        candidatesTotal: candidates.length,
        attemptIndex: tried.length,
      }, startTime);
    }

    if (i < candidates.length - 1 && delayMs > 0) {
      await wait(delayMs);
    }
  }

  return buildOutcome(identity, domain, {
    email: null,
    status: OUTCOME_STATUS.NOT_FOUND,
    candidatesTried: tried,
    candidatesTotal: candidates.length,
    attemptIndex: null,
  }, startTime);
}

/**
 * Main email finder function: normalize raw contact fields, then probe
 */
export async function findEmail(
  input: ContactInput,
  oracle: EmailOracle,
  options: VerifyOptions = {}
): Promise<VerificationOutcome> {
  const firstName = input.firstName.trim();
  const lastName = input.lastName.trim();
  const fullName = `${firstName} ${lastName}`.trim();

  const outcome = await verifyCandidates(
    normalizeName(fullName),
    normalizeDomain(input.companyUrl),
    oracle,
    options,
    { firstName, lastName, fullName }
  );

  logger.info({
    name: fullName,
    domain: outcome.domain,
    email: outcome.email,
    status: outcome.status,
    attempt: outcome.attemptIndex,
    tried: outcome.candidatesTried.length,
    total: outcome.candidatesTotal,
    duration: outcome.durationMs,
  }, 'Email finder completed');

  return outcome;
}

/**
 * Oracle calls avoided by stopping early
 */
export function callsSaved(outcome: VerificationOutcome): number {
  return outcome.candidatesTotal - outcome.candidatesTried.length;
}
