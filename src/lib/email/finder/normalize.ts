/**
 * Name and domain normalization
 * Turns operator input into the tokens the pattern generator works on
 */

import type { ParsedName } from './types';

/**
 * Lowercase, fold accents and keep only a-z
 */
export function cleanName(name: string): string {
  return name
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove accents
    .replace(/[^a-z]/g, '');
}

/**
 * Canonical company domain: no scheme, no `www.`, no path, lowercase.
 * Returns '' when nothing usable is left.
 */
export function normalizeDomain(raw: string | null | undefined): string {
  if (typeof raw !== 'string' || !raw.trim()) {
    return '';
  }

  let domain = raw.trim().replace(/^https?:\/\//i, '');
  domain = domain.replace(/^www\./i, '');
  domain = domain.split('/')[0] ?? '';

  return domain.trim().toLowerCase();
}

/**
 * Split a full name into first / middle / last.
 *
 * One token is used as both first and last. Interior tokens of longer names
 * collapse into a single middle token. Returns null when no letters survive
 * in either first or last.
 */
export function normalizeName(fullName: string | null | undefined): ParsedName | null {
  if (typeof fullName !== 'string') {
    return null;
  }

  const parts = fullName.trim().split(/\s+/).filter(Boolean);

  if (parts.length === 0) {
    return null;
  }

  const first = cleanName(parts[0]);

  if (parts.length === 1) {
    return first ? { first, last: first } : null;
  }

  const last = cleanName(parts[parts.length - 1]);
  const middle = parts.slice(1, -1).map(cleanName).join('');

  if (!first && !last) {
    return null;
  }

  return middle ? { first, middle, last } : { first, last };
}
