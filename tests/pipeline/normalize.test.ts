import { describe, it, expect } from 'vitest';
import {
  RELEVANCE_KEYWORDS,
  candidatePoolSize,
  clampLimit,
  isRelevant,
  normalizeCandidates,
} from '../../src/pipeline/normalize.js';
import type { RawCandidate } from '../../src/types.js';

function candidate(title: string, href: string): RawCandidate {
  return { title, href };
}

describe('normalizeCandidates', () => {
  it('emits one record per URL and keeps the first fields', () => {
    const records = normalizeCandidates(
      [
        { title: 'Nurse Practitioner - Clinic A', href: 'https://a.test/job/1', job_number: '1' },
        { title: 'Nurse Practitioner - Clinic B', href: 'https://a.test/job/1' },
        { title: 'Nurse Practitioner - Clinic C', href: 'https://a.test/job/1/' },
      ],
      'titanplacementgroup',
      { limit: 10 },
    );

    expect(records).toEqual([
      { title: 'Nurse Practitioner - Clinic A', url: 'https://a.test/job/1', source: 'titanplacementgroup', job_number: '1' },
      { title: 'Nurse Practitioner - Clinic C', url: 'https://a.test/job/1/', source: 'titanplacementgroup' },
    ]);
  });

  it('filters by keyword before applying the limit', () => {
    const records = normalizeCandidates(
      [
        candidate('Receptionist', 'https://n.test/1'),
        candidate('Family Nurse Practitioner – Clinic X', 'https://n.test/2'),
        candidate('Billing Specialist', 'https://n.test/3'),
        candidate('Certified Nurse Midwife', 'https://n.test/4'),
        candidate('PMHNP Telehealth', 'https://n.test/5'),
      ],
      'npnow',
      { limit: 2, keywords: RELEVANCE_KEYWORDS },
    );

    expect(records.map((record) => record.title)).toEqual([
      'Family Nurse Practitioner – Clinic X',
      'Certified Nurse Midwife',
    ]);
  });

  it('never returns more than the limit', () => {
    const many = Array.from({ length: 250 }, (_, i) => candidate(`Physician Assistant ${i}`, `https://n.test/${i}`));

    expect(normalizeCandidates(many, 'npnow', { limit: 100, keywords: RELEVANCE_KEYWORDS })).toHaveLength(100);
    expect(normalizeCandidates(many, 'npnow', { limit: 1 })).toHaveLength(1);
  });

  it('trims titles and drops empty ones', () => {
    const records = normalizeCandidates(
      [candidate('   ', 'https://n.test/blank'), candidate('  Midwife Lead  ', 'https://n.test/lead')],
      'npnow',
      { limit: 5 },
    );

    expect(records).toEqual([{ title: 'Midwife Lead', url: 'https://n.test/lead', source: 'npnow' }]);
  });

  it('accepts a substitute keyword table', () => {
    const records = normalizeCandidates(
      [candidate('Pediatric Dentist', 'https://n.test/d'), candidate('Nurse Practitioner', 'https://n.test/np')],
      'npnow',
      { limit: 5, keywords: ['dentist'] },
    );

    expect(records.map((record) => record.url)).toEqual(['https://n.test/d']);
  });
});

describe('isRelevant', () => {
  it('matches substrings case-insensitively', () => {
    expect(isRelevant({ title: 'Family Nurse Practitioner – Clinic X' }, RELEVANCE_KEYWORDS)).toBe(true);
    expect(isRelevant({ title: 'Receptionist' }, RELEVANCE_KEYWORDS)).toBe(false);
  });

  it('does not match a partial keyword', () => {
    expect(isRelevant({ title: 'Physician - Internal Medicine' }, RELEVANCE_KEYWORDS)).toBe(false);
  });

  it('looks at the description when present', () => {
    expect(
      isRelevant({ title: 'Clinical Role', description: 'Seeking a certified nurse midwife' }, RELEVANCE_KEYWORDS),
    ).toBe(true);
  });
});

describe('limits', () => {
  it('clamps to 1..100', () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(150)).toBe(100);
    expect(clampLimit(Number.NaN)).toBe(1);
    expect(clampLimit(12.7)).toBe(12);
  });

  it('asks for a larger pool only when filtering', () => {
    expect(candidatePoolSize(20, true)).toBe(100);
    expect(candidatePoolSize(20, false)).toBe(20);
    expect(candidatePoolSize(100, true)).toBe(500);
  });
});
