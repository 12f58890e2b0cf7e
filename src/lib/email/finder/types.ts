/**
 * Shared types for the email finder
 */

import type { Result } from '../../result';
import type { OracleTransportError } from '../../errors';
import type { SlotLimiter } from '../../rate-limiter';

export interface ParsedName {
  first: string;
  middle?: string;
  last: string;
}

export interface NameParts extends ParsedName {
  domain: string;
}

export interface EmailCandidate {
  email: string;
  localPart: string;
  /** Template of the rule that produced it, e.g. `{f}{last}` */
  pattern: string;
  /** 1-based position of that rule in the rule table */
  priority: number;
}

/**
 * Raw contact as typed by an operator or read from a CSV row
 */
export interface ContactInput {
  firstName: string;
  lastName: string;
  companyUrl: string;
}

export interface OracleVerdict {
  /** Lowercased provider status, e.g. `valid`, `catch_all`, `invalid` */
  status: string;
  raw: Record<string, unknown>;
}

export type OracleResponse = Result<OracleVerdict, OracleTransportError>;

/**
 * External email verification capability
 */
export interface EmailOracle {
  readonly name: string;
  verify(email: string, options?: OracleRequestOptions): Promise<OracleResponse>;
}

export interface OracleRequestOptions {
  /**
   * Limiter the caller took a slot from for this probe. A client that sends
   * more than one request for the probe takes a new slot for each extra one.
   */
  limiter?: SlotLimiter;
}

export interface VerificationOutcome {
  readonly firstName: string;
  readonly lastName: string;
  readonly domain: string;
  readonly fullName: string;
  readonly email: string | null;
  readonly status: string;
  readonly candidatesTried: readonly string[];
  readonly candidatesTotal: number;
  readonly attemptIndex: number | null;
  readonly durationMs: number;
}
