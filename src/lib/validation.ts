import { z } from 'zod';
import { BATCH } from './constants';

/**
 * Zod schemas for API and file input validation
 */

// ============================================
// CONTACT SCHEMAS
// ============================================

const requiredField = (name: string) =>
  z.string({ required_error: `${name} is required`, invalid_type_error: `${name} must be a string` })
    .trim()
    .min(1, `${name} is required`)
    .max(255);

/**
 * A batch row fit for lookup: all three fields present and not blank
 */
export const contactRowSchema = z.object({
  firstname: requiredField('firstname'),
  lastname: requiredField('lastname'),
  companyURL: requiredField('companyURL'),
});

export type ContactRow = z.infer<typeof contactRowSchema>;

// ============================================
// FIND-EMAIL API SCHEMAS
// ============================================

export const findEmailSchema = z.object({
  firstname: requiredField('firstname'),
  lastname: requiredField('lastname'),
  company_url: requiredField('company_url'),
});

/**
 * Rows with missing fields are allowed here; they are reported as skipped
 */
export const batchFindSchema = z.object({
  contacts: z.array(z.object({
    firstname: z.string().max(255).optional(),
    lastname: z.string().max(255).optional(),
    company_url: z.string().max(2048).optional(),
  })).min(1).max(BATCH.MAX_JSON_CONTACTS),
  concurrency: z.number().int().min(1).max(BATCH.MAX_CONCURRENCY).optional(),
});

export const csvUploadQuerySchema = z.object({
  firstname: z.string().min(1).optional(),
  lastname: z.string().min(1).optional(),
  company_url: z.string().min(1).optional(),
  format: z.enum(['json', 'csv']).default('json'),
  found_only: z.enum(['true', 'false']).default('false').transform(value => value === 'true'),
  concurrency: z.coerce.number().int().min(1).max(BATCH.MAX_CONCURRENCY).optional(),
});

/**
 * One line per issue, prefixed with the offending field
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}
