import { describe, it, expect } from 'vitest';
import { PATTERN_RULES, applyPattern, generateEmailCandidates, generateEmails } from './patterns';

describe('PATTERN_RULES', () => {
  it('should list the fourteen rules in probe order', () => {
    expect(PATTERN_RULES.map(rule => rule.template)).toEqual([
      '{f}{last}',
      '{first}',
      '{first}.{last}',
      '{last}',
      '{f}{l}',
      '{first}{last}',
      '{first}{l}',
      '{last}{f}',
      '{last}.{f}',
      '{last}{first}',
      '{first}_{last}',
      '{f}{m}{l}',
      '{first}.{m}.{last}',
      '{f}{m}{last}',
    ]);
    expect(PATTERN_RULES.map(rule => rule.priority)).toEqual(
      Array.from({ length: 14 }, (_, i) => i + 1)
    );
  });
});

describe('applyPattern', () => {
  const values = { first: 'john', middle: '', last: 'smith', f: 'j', m: '', l: 's' };

  it('should fill every placeholder', () => {
    expect(applyPattern('{first}.{last}', values)).toBe('john.smith');
    expect(applyPattern('{last}.{f}', values)).toBe('smith.j');
  });

  it('should return null when a placeholder is empty', () => {
    expect(applyPattern('{f}{m}{l}', values)).toBeNull();
  });
});

describe('generateEmailCandidates', () => {
  it('should generate the eleven candidates for a two-part name in order', () => {
    expect(generateEmails({ first: 'john', last: 'smith', domain: 'company.com' })).toEqual([
      'jsmith@company.com',
      'john@company.com',
      'john.smith@company.com',
      'smith@company.com',
      'js@company.com',
      'johnsmith@company.com',
      'johns@company.com',
      'smithj@company.com',
      'smith.j@company.com',
      'smithjohn@company.com',
      'john_smith@company.com',
    ]);
  });

  it('should append the middle-name patterns last', () => {
    const emails = generateEmails({ first: 'mary', middle: 'ann', last: 'smith', domain: 'acme.com' });

    expect(emails).toHaveLength(14);
    expect(emails.slice(11)).toEqual([
      'mas@acme.com',
      'mary.a.smith@acme.com',
      'masmith@acme.com',
    ]);
  });

  it('should drop coinciding local-parts and keep the first occurrence', () => {
    const candidates = generateEmailCandidates({ first: 'a', last: 'b', domain: 'x.io' });

    expect(candidates.map(c => c.localPart)).toEqual(['ab', 'a', 'a.b', 'b', 'ba', 'b.a', 'a_b']);
    expect(candidates.map(c => c.priority)).toEqual([1, 2, 3, 4, 8, 9, 11]);
    expect(candidates[0]).toEqual({
      email: 'ab@x.io',
      localPart: 'ab',
      pattern: '{f}{last}',
      priority: 1,
    });
  });

  it('should never contain duplicates for a single-token name', () => {
    const emails = generateEmails({ first: 'madonna', last: 'madonna', domain: 'music.com' });

    expect(new Set(emails).size).toBe(emails.length);
    expect(emails).toEqual([
      'mmadonna@music.com',
      'madonna@music.com',
      'madonna.madonna@music.com',
      'mm@music.com',
      'madonnamadonna@music.com',
      'madonnam@music.com',
      'madonna.m@music.com',
      'madonna_madonna@music.com',
    ]);
  });

  it('should skip every rule that needs an empty last name', () => {
    expect(generateEmails({ first: 'john', last: '', domain: 'acme.com' })).toEqual(['john@acme.com']);
  });

  it('should skip every rule that needs an empty first name', () => {
    expect(generateEmails({ first: '', last: 'smith', domain: 'acme.com' })).toEqual(['smith@acme.com']);
  });

  it('should return nothing without a domain', () => {
    expect(generateEmailCandidates({ first: 'john', last: 'smith', domain: '' })).toEqual([]);
  });

  it('should be deterministic', () => {
    const parts = { first: 'mary', middle: 'ann', last: 'smith', domain: 'acme.com' };
    expect(generateEmailCandidates(parts)).toEqual(generateEmailCandidates(parts));
  });
});
