/**
 * Third-Party Email Verification Service
 *
 * Reoon Email Verifier:
 *   GET {baseUrl}?email=<address>&key=<api key>&mode=power|quick
 *   → JSON with a `status` field (valid, safe, catch_all, invalid, disabled, unknown, ...)
 *
 * Every failure to obtain a status comes back as an OracleTransportError
 * result rather than an exception.
 */

import { z } from 'zod';
import { logger } from '../../logger';
import { config, type ReoonMode } from '../../config';
import { VERIFICATION } from '../../constants';
import {
  ConfigurationError,
  HttpStatusError,
  OracleTransportError,
  TimeoutError,
  getErrorMessage,
} from '../../errors';
import { err, ok } from '../../result';
import { retryFetch } from '../../retry';
import { fetchWithTimeout } from '../../timeout';
import type { EmailOracle, OracleRequestOptions, OracleResponse } from './types';

const PROVIDER = 'reoon';

export interface ReoonOracleOptions {
  apiKey: string;
  mode?: ReoonMode;
  baseUrl?: string;
  timeoutMs?: number;
  /** Attempts per probe for network errors and 429/5xx (default: 2) */
  retryAttempts?: number;
  retryDelayMs?: number;
}

const reoonResponseSchema = z
  .object({
    status: z.string().min(1),
  })
  .passthrough();

function toTransportError(error: unknown): OracleTransportError {
  if (error instanceof TimeoutError) {
    return new OracleTransportError(PROVIDER, 'timeout', error.message);
  }
  if (error instanceof HttpStatusError) {
    return new OracleTransportError(PROVIDER, 'http', error.message, error.status);
  }
  return new OracleTransportError(PROVIDER, 'network', getErrorMessage(error));
}

/**
 * Reoon-backed oracle. Holds no per-call state, so one instance can serve a
 * whole batch.
 */
export function createReoonOracle(options: ReoonOracleOptions): EmailOracle {
  const mode = options.mode ?? 'power';
  const baseUrl = options.baseUrl ?? 'https://emailverifier.reoon.com/api/v1/verify';
  const timeout = options.timeoutMs ?? config.verifier.timeoutMs;
  const attempts = Math.max(1, options.retryAttempts ?? VERIFICATION.RETRY_ATTEMPTS);
  const retryDelay = options.retryDelayMs ?? VERIFICATION.RETRY_DELAY_MS;

  async function verify(email: string, request: OracleRequestOptions = {}): Promise<OracleResponse> {
    const params = new URLSearchParams({ email, key: options.apiKey, mode });
    const url = `${baseUrl}?${params}`;

    let response: Response;
    try {
      response = await retryFetch(
        () => fetchWithTimeout(url, { method: 'GET', timeout }),
        { attempts, delay: retryDelay, limiter: request.limiter }
      );
    } catch (error) {
      return err(toTransportError(error));
    }

    if (!response.ok) {
      return err(new OracleTransportError(
        PROVIDER,
        'http',
        `HTTP ${response.status}: ${response.statusText}`,
        response.status
      ));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return err(new OracleTransportError(PROVIDER, 'malformed', `Response was not JSON: ${getErrorMessage(error)}`));
    }

    const parsed = reoonResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(new OracleTransportError(PROVIDER, 'malformed', 'Response has no status field'));
    }

    const status = parsed.data.status.trim().toLowerCase();
    logger.debug({ service: PROVIDER, email, status }, 'Verification response');

    return ok({ status, raw: { ...parsed.data } });
  }

  return { name: PROVIDER, verify };
}

/**
 * Oracle built from environment configuration
 */
export function getDefaultOracle(): EmailOracle {
  const apiKey = config.reoon.apiKey;
  if (!apiKey) {
    throw new ConfigurationError('REOON_API_KEY', 'Email verification API key is not configured');
  }

  return createReoonOracle({
    apiKey,
    mode: config.reoon.mode,
    baseUrl: config.reoon.baseUrl,
    timeoutMs: config.verifier.timeoutMs,
    retryAttempts: config.verifier.retryAttempts,
  });
}

export function getConfiguredServices(): string[] {
  return config.reoon.isConfigured ? [PROVIDER] : [];
}
