/**
 * CSV batch upload
 *
 * POST /api/find-email/csv
 *   body: raw CSV text
 *   query: firstname, lastname, company_url  (column name overrides)
 *          format=json|csv, found_only=true|false, concurrency
 */

import { NextRequest } from 'next/server';
import { z } from 'zod';
import { findEmailsBatch, getDefaultOracle } from '@/lib/email/finder';
import { outcomesToCsv, parseContactsCsv } from '@/lib/contacts';
import { csvFile, errors, success } from '@/lib/api-response';
import { ConfigurationError, ValidationError } from '@/lib/errors';
import { config } from '@/lib/config';
import { log, logger } from '@/lib/logger';
import { csvUploadQuerySchema, formatZodError } from '@/lib/validation';

export async function POST(request: NextRequest) {
  try {
    const query = csvUploadQuerySchema.parse(Object.fromEntries(request.nextUrl.searchParams));
    const content = await request.text();

    if (!content.trim()) {
      return errors.badRequest('CSV body is empty');
    }

    const file = parseContactsCsv(content, {
      firstname: query.firstname,
      lastname: query.lastname,
      companyUrl: query.company_url,
    });

    if (file.contacts.length > config.batch.maxRows) {
      return errors.payloadTooLarge(`At most ${config.batch.maxRows} rows per upload`);
    }

    const oracle = getDefaultOracle();

    log.api('/api/find-email/csv', {
      rows: file.totalRows,
      contacts: file.contacts.length,
      skipped: file.skipped.length,
      columns: file.columns,
    });

    const { outcomes, summary } = await findEmailsBatch(file.contacts, oracle, {
      concurrency: query.concurrency,
    });

    if (query.format === 'csv') {
      const stamp = new Date().toISOString().replace(/[-:]/g, '').slice(0, 15);
      return csvFile(
        outcomesToCsv(outcomes, { foundOnly: query.found_only }),
        `verified_emails_${stamp}.csv`
      );
    }

    const results = query.found_only ? outcomes.filter(outcome => outcome.email !== null) : outcomes;

    return success({
      columns: file.columns,
      totalRows: file.totalRows,
      skipped: file.skipped,
      summary,
      results,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      return errors.badRequest(`Validation error: ${formatZodError(error)}`);
    }
    if (error instanceof ValidationError) {
      return errors.badRequest(error.message, error);
    }
    if (error instanceof ConfigurationError) {
      return errors.serviceUnavailable(error.message, error);
    }
    logger.error({ error }, 'CSV batch error');
    return errors.internal('CSV batch failed', error);
  }
}
