/**
 * Email Pattern Generator
 * Builds the ordered list of candidate addresses for a name + domain
 */

import type { EmailCandidate, NameParts } from './types';

type Placeholder = 'first' | 'middle' | 'last' | 'f' | 'm' | 'l';

export interface PatternRule {
  template: string;
  priority: number;
}

/**
 * Corporate local-part conventions, most common first.
 * Probing follows this order, so position here is the attempt order.
 */
export const PATTERN_RULES: readonly PatternRule[] = [
  { template: '{f}{last}', priority: 1 },
  { template: '{first}', priority: 2 },
  { template: '{first}.{last}', priority: 3 },
  { template: '{last}', priority: 4 },
  { template: '{f}{l}', priority: 5 },
  { template: '{first}{last}', priority: 6 },
  { template: '{first}{l}', priority: 7 },
  { template: '{last}{f}', priority: 8 },
  { template: '{last}.{f}', priority: 9 },
  { template: '{last}{first}', priority: 10 },
  { template: '{first}_{last}', priority: 11 },

  // Only when a middle name is known
  { template: '{f}{m}{l}', priority: 12 },
  { template: '{first}.{m}.{last}', priority: 13 },
  { template: '{f}{m}{last}', priority: 14 },
];

const PLACEHOLDER_RE = /\{(first|middle|last|f|m|l)\}/g;

function isPlaceholder(value: string): value is Placeholder {
  return ['first', 'middle', 'last', 'f', 'm', 'l'].includes(value);
}

/**
 * Fill a template, or return null if it references an empty component
 */
export function applyPattern(template: string, values: Record<Placeholder, string>): string | null {
  let missing = false;

  const local = template.replace(PLACEHOLDER_RE, (_, key: string) => {
    const value = isPlaceholder(key) ? values[key] : '';
    if (!value) missing = true;
    return value;
  });

  return missing || !local ? null : local;
}

/**
 * Generate all email candidates for a name + domain.
 * Pure: the same input always yields the same ordered list.
 */
export function generateEmailCandidates(nameParts: NameParts): EmailCandidate[] {
  const { first, middle = '', last, domain } = nameParts;

  if (!domain) {
    return [];
  }

  const values: Record<Placeholder, string> = {
    first,
    middle,
    last,
    f: first.charAt(0),
    m: middle.charAt(0),
    l: last.charAt(0),
  };

  const candidates: EmailCandidate[] = [];
  const seen = new Set<string>();

  for (const rule of PATTERN_RULES) {
    const localPart = applyPattern(rule.template, values);
    if (!localPart || seen.has(localPart)) continue;

    seen.add(localPart);
    candidates.push({
      email: `${localPart}@${domain}`,
      localPart,
      pattern: rule.template,
      priority: rule.priority,
    });
  }

  return candidates;
}

/**
 * Candidate addresses only, in probe order
 */
export function generateEmails(nameParts: NameParts): string[] {
  return generateEmailCandidates(nameParts).map(candidate => candidate.email);
}
