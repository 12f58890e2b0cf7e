/**
 * Email Finder API
 *
 * POST /api/find-email - Find the email for one contact, or for a batch
 * GET /api/find-email - Finder status and settings
 */

import { NextRequest } from 'next/server';
import { z } from 'zod';
import {
  findEmail,
  findEmailsBatch,
  getConfiguredServices,
  getDefaultOracle,
  PATTERN_RULES,
} from '@/lib/email/finder';
import { filterContactRows } from '@/lib/contacts';
import { success, errors } from '@/lib/api-response';
import { ConfigurationError } from '@/lib/errors';
import { config } from '@/lib/config';
import { logger } from '@/lib/logger';
import { batchFindSchema, findEmailSchema, formatZodError } from '@/lib/validation';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return errors.badRequest('Request body must be JSON');
  }

  try {
    // Batch request
    if (isRecord(body) && 'contacts' in body) {
      const parsed = batchFindSchema.parse(body);
      const oracle = getDefaultOracle();

      const { contacts, skipped } = filterContactRows(
        parsed.contacts.map(c => ({
          firstname: c.firstname,
          lastname: c.lastname,
          companyURL: c.company_url,
        }))
      );

      const { outcomes, summary } = await findEmailsBatch(contacts, oracle, {
        concurrency: parsed.concurrency,
      });

      return success({ summary, skipped, results: outcomes });
    }

    // Single lookup
    const parsed = findEmailSchema.parse(body);
    const oracle = getDefaultOracle();

    const outcome = await findEmail(
      {
        firstName: parsed.firstname,
        lastName: parsed.lastname,
        companyUrl: parsed.company_url,
      },
      oracle
    );

    logger.info({
      name: outcome.fullName,
      domain: outcome.domain,
      email: outcome.email,
      status: outcome.status,
    }, 'Email finder request');

    return success(outcome);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return errors.badRequest(`Validation error: ${formatZodError(error)}`);
    }
    if (error instanceof ConfigurationError) {
      return errors.serviceUnavailable(error.message, error);
    }
    logger.error({ error }, 'Email finder error');
    return errors.internal('Email finder failed', error);
  }
}

export async function GET() {
  const services = getConfiguredServices();

  return success({
    status: services.length > 0 ? 'operational' : 'unconfigured',
    oracle: {
      provider: 'reoon',
      configured: config.reoon.isConfigured,
      mode: config.reoon.mode,
    },
    patterns: {
      count: PATTERN_RULES.length,
      order: PATTERN_RULES.map(rule => rule.template),
    },
    verification: {
      forbiddenStatuses: config.verifier.forbiddenStatuses,
      delayMs: config.verifier.delayMs,
      minIntervalMs: config.verifier.minIntervalMs,
      timeoutMs: config.verifier.timeoutMs,
    },
    batch: {
      concurrency: config.batch.concurrency,
      maxRows: config.batch.maxRows,
    },
  });
}
