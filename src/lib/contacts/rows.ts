/**
 * Batch row filtering
 * Rows missing a field, or with a blank one, never reach the finder.
 */

import { contactRowSchema } from '../validation';
import type { ContactInput } from '../email/finder';

export interface RawContactRow {
  firstname?: unknown;
  lastname?: unknown;
  companyURL?: unknown;
}

export interface SkippedRow {
  /** 1-based position in the input */
  row: number;
  missing: string[];
}

export interface FilteredContacts {
  contacts: ContactInput[];
  skipped: SkippedRow[];
}

export function filterContactRows(rows: readonly RawContactRow[]): FilteredContacts {
  const contacts: ContactInput[] = [];
  const skipped: SkippedRow[] = [];

  rows.forEach((row, index) => {
    const parsed = contactRowSchema.safeParse(row);

    if (parsed.success) {
      contacts.push({
        firstName: parsed.data.firstname,
        lastName: parsed.data.lastname,
        companyUrl: parsed.data.companyURL,
      });
      return;
    }

    const missing = [...new Set(parsed.error.issues.map(issue => String(issue.path[0] ?? 'row')))];
    skipped.push({ row: index + 1, missing });
  });

  return { contacts, skipped };
}
