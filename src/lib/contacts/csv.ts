/**
 * CSV ingestion and export for batch lookups
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ValidationError } from '../errors';
import type { VerificationOutcome } from '../email/finder';
import {
  detectColumns,
  resolveColumns,
  type ColumnDetection,
  type ColumnMapping,
  type ColumnOverrides,
} from './columns';
import { filterContactRows, type FilteredContacts, type RawContactRow } from './rows';

export interface ParsedSheet {
  headers: string[];
  records: Record<string, string>[];
}

export interface ContactsFile extends FilteredContacts {
  columns: ColumnMapping;
  detection: ColumnDetection;
  totalRows: number;
}

const rowsSchema = z.array(z.array(z.string()));

/**
 * Parse CSV text into a header list and one record per data row
 */
export function parseCsv(content: string): ParsedSheet {
  let rows: string[][];
  try {
    rows = rowsSchema.parse(parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    }));
  } catch (error) {
    throw new ValidationError(
      `Could not parse CSV: ${error instanceof Error ? error.message : String(error)}`,
      'file'
    );
  }

  const [headerRow, ...dataRows] = rows;
  if (!headerRow || headerRow.length === 0) {
    throw new ValidationError('CSV file is empty', 'file');
  }

  const headers = headerRow.map((header, index) => header || `column_${index + 1}`);
  const records = dataRows.map(row => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      record[header] = row[index] ?? '';
    });
    return record;
  });

  return { headers, records };
}

/**
 * Split "Mary Ann Smith" into firstname "Mary", lastname "Ann Smith"
 */
function splitFullName(value: string): { firstname: string; lastname: string } {
  const [firstname = '', ...rest] = value.trim().split(/\s+/);
  return { firstname, lastname: rest.join(' ') };
}

export function extractContactRows(records: readonly Record<string, string>[], columns: ColumnMapping): RawContactRow[] {
  return records.map(record => {
    const companyURL = record[columns.companyUrl];

    if (columns.firstname && columns.lastname) {
      return {
        firstname: record[columns.firstname],
        lastname: record[columns.lastname],
        companyURL,
      };
    }

    const { firstname, lastname } = splitFullName(columns.fullName ? record[columns.fullName] ?? '' : '');
    return { firstname, lastname, companyURL };
  });
}

/**
 * Parse an uploaded contact sheet down to lookup-ready contacts
 */
export function parseContactsCsv(content: string, overrides: ColumnOverrides = {}): ContactsFile {
  const { headers, records } = parseCsv(content);
  const detection = detectColumns(headers, records);
  const columns = resolveColumns(headers, detection, overrides);
  const { contacts, skipped } = filterContactRows(extractContactRows(records, columns));

  return {
    columns,
    detection,
    contacts,
    skipped,
    totalRows: records.length,
  };
}

export const RESULT_COLUMNS = [
  'firstname',
  'lastname',
  'company',
  'email',
  'status',
  'attemptIndex',
  'candidatesTried',
  'candidatesTotal',
] as const;

/**
 * Flatten outcomes into a results CSV (header row included)
 */
export function outcomesToCsv(
  outcomes: readonly VerificationOutcome[],
  options: { foundOnly?: boolean } = {}
): string {
  const rows = outcomes
    .filter(outcome => !options.foundOnly || outcome.email !== null)
    .map(outcome => ({
      firstname: outcome.firstName,
      lastname: outcome.lastName,
      company: outcome.domain,
      email: outcome.email ?? '',
      status: outcome.status,
      attemptIndex: outcome.attemptIndex ?? '',
      candidatesTried: outcome.candidatesTried.length,
      candidatesTotal: outcome.candidatesTotal,
    }));

  return stringify(rows, { header: true, columns: [...RESULT_COLUMNS] });
}
