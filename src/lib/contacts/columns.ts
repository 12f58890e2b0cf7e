/**
 * Column detection for uploaded contact sheets
 *
 * Each header is scored against name patterns for the fields we need, then
 * boosted by what its values look like (URLs, emails, single-word names,
 * multi-word full names).
 */

import { BATCH } from '../constants';
import { ValidationError } from '../errors';

export type ContentType = 'url' | 'email' | 'name' | 'full_name' | 'phone' | 'unknown';

export type DetectedField = 'firstname' | 'lastname' | 'companyUrl' | 'email' | 'fullName';

export interface ContentAnalysis {
  type: ContentType;
  confidence: number;
  samples: string[];
}

export interface ColumnCandidate {
  column: string;
  score: number;
  contentType: ContentType;
}

export interface FieldMatch {
  column: string | null;
  confidence: number;
  candidates: ColumnCandidate[];
}

export type ColumnDetection = Record<DetectedField, FieldMatch>;

export interface ColumnMapping {
  firstname?: string;
  lastname?: string;
  companyUrl: string;
  fullName?: string;
}

export interface ColumnOverrides {
  firstname?: string;
  lastname?: string;
  companyUrl?: string;
}

interface HeaderPattern {
  regex: RegExp;
  score: number;
}

const EXACT = 90;
const PARTIAL = 70;

const HEADER_PATTERNS: Record<DetectedField, HeaderPattern[]> = {
  firstname: [
    { regex: /^(first|fname|firstname|first_name|given|given_name|forename)$/, score: EXACT },
    { regex: /^f_?name$/, score: EXACT },
    { regex: /^(prenom|nome|vorname)$/, score: EXACT },
    { regex: /first/, score: PARTIAL },
  ],
  lastname: [
    { regex: /^(last|lname|lastname|last_name|surname|family|family_name)$/, score: EXACT },
    { regex: /^l_?name$/, score: EXACT },
    { regex: /^(nom|apellido|nachname)$/, score: EXACT },
    { regex: /last|surname/, score: PARTIAL },
  ],
  companyUrl: [
    { regex: /^(url|website|site|domain|company_?url|company_?website|company_?domain)$/, score: EXACT },
    { regex: /^(web|link|homepage|www)$/, score: EXACT },
    { regex: /(company|corp|business).*(url|site|web|domain)/, score: PARTIAL },
    { regex: /website|domain|url/, score: PARTIAL },
  ],
  email: [
    { regex: /^(email|mail|e_?mail|email_?address)$/, score: EXACT },
    { regex: /mail/, score: PARTIAL },
  ],
  fullName: [
    { regex: /^(name|full_?name|complete_?name|contact_?name)$/, score: EXACT },
    { regex: /full.*name|complete.*name/, score: PARTIAL },
  ],
};

const CONTENT_BOOST: Record<DetectedField, ContentType> = {
  firstname: 'name',
  lastname: 'name',
  companyUrl: 'url',
  email: 'email',
  fullName: 'full_name',
};

const COMMON_TLDS = ['.com', '.org', '.net', '.io', '.co', '.gov', '.edu'];

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function share(values: string[], predicate: (value: string) => boolean): number {
  return (values.filter(predicate).length / values.length) * 100;
}

/**
 * Guess what kind of data a column holds from up to 50 non-empty values
 */
export function analyzeColumnContent(values: readonly string[]): ContentAnalysis {
  const samples = values
    .map(value => value.trim())
    .filter(Boolean)
    .slice(0, BATCH.COLUMN_SAMPLE_SIZE);

  if (samples.length === 0) {
    return { type: 'unknown', confidence: 0, samples };
  }

  const avgLength = samples.reduce((sum, value) => sum + value.length, 0) / samples.length;
  const hasAt = share(samples, v => v.includes('@'));
  const hasHttp = share(samples, v => /^(http|www)/i.test(v));
  const hasTld = share(samples, v => COMMON_TLDS.some(tld => v.toLowerCase().includes(tld)));
  const hasDots = share(samples, v => v.includes('.'));
  const hasSpaces = share(samples, v => v.includes(' '));
  const numeric = share(samples, v => /^\d+$/.test(v.replace(/[.\-\s+()]/g, '')));
  const singleWords = share(samples, v => v.split(/\s+/).length === 1);
  const multipleWords = 100 - singleWords;

  const preview = samples.slice(0, 5);

  if (hasAt > 70) {
    return { type: 'email', confidence: Math.min(95, hasAt), samples: preview };
  }

  if (hasTld > 60 || hasHttp > 30 || hasDots > 70) {
    return { type: 'url', confidence: Math.min(90, hasTld + hasHttp), samples: preview };
  }

  if (numeric > 60) {
    return { type: 'phone', confidence: 60, samples: preview };
  }

  if (singleWords > 70 && avgLength < 15 && hasSpaces < 20) {
    return { type: 'name', confidence: 70, samples: preview };
  }

  if (multipleWords > 50 && hasSpaces > 40 && avgLength > 8) {
    return { type: 'full_name', confidence: 75, samples: preview };
  }

  return { type: 'unknown', confidence: 0, samples: preview };
}

function headerScore(header: string, field: DetectedField): number {
  const normalized = normalizeHeader(header);
  const match = HEADER_PATTERNS[field].find(pattern => pattern.regex.test(normalized));
  return match?.score ?? 0;
}

/**
 * Score every column for every field and pick the best one per field.
 * A column is used for at most one of firstname / lastname / companyUrl.
 */
export function detectColumns(
  headers: readonly string[],
  records: readonly Record<string, string>[]
): ColumnDetection {
  const analyses = new Map<string, ContentAnalysis>();
  for (const header of headers) {
    analyses.set(header, analyzeColumnContent(records.map(record => record[header] ?? '')));
  }

  const claimed = new Set<string>();

  const matchField = (field: DetectedField, exclusive: boolean): FieldMatch => {
    const candidates: ColumnCandidate[] = [];

    for (const header of headers) {
      const analysis = analyses.get(header);
      const contentType = analysis?.type ?? 'unknown';
      let score = headerScore(header, field);

      if (analysis && contentType === CONTENT_BOOST[field]) {
        score = Math.max(score, analysis.confidence);
      }

      if (score > 0) {
        candidates.push({ column: header, score, contentType });
      }
    }

    candidates.sort((a, b) => b.score - a.score);

    const best = exclusive
      ? candidates.find(candidate => !claimed.has(candidate.column))
      : candidates[0];

    if (best && exclusive) {
      claimed.add(best.column);
    }

    return {
      column: best?.column ?? null,
      confidence: best?.score ?? 0,
      candidates,
    };
  };

  // Order matters: earlier fields claim their column first
  const firstname = matchField('firstname', true);
  const lastname = matchField('lastname', true);
  const companyUrl = matchField('companyUrl', true);

  return {
    firstname,
    lastname,
    companyUrl,
    email: matchField('email', false),
    fullName: matchField('fullName', false),
  };
}

/**
 * Combine detection with operator overrides into the columns to read.
 * Needs a company column plus either first+last or a full-name column.
 */
export function resolveColumns(
  headers: readonly string[],
  detection: ColumnDetection,
  overrides: ColumnOverrides = {}
): ColumnMapping {
  for (const [field, column] of Object.entries(overrides)) {
    if (column && !headers.includes(column)) {
      throw new ValidationError(`Column "${column}" not found in file`, field, { headers: [...headers] });
    }
  }

  const firstname = overrides.firstname ?? detection.firstname.column ?? undefined;
  const lastname = overrides.lastname ?? detection.lastname.column ?? undefined;
  const companyUrl = overrides.companyUrl ?? detection.companyUrl.column ?? undefined;
  const fullName = detection.fullName.column ?? undefined;

  if (!companyUrl) {
    throw new ValidationError('Could not find a company URL column', 'companyUrl', { headers: [...headers] });
  }

  if (firstname && lastname) {
    return { firstname, lastname, companyUrl };
  }

  if (fullName) {
    return { companyUrl, fullName };
  }

  throw new ValidationError('Could not find first and last name columns', 'firstname', { headers: [...headers] });
}
