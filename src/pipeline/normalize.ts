import type { JobRecord, RawCandidate, SourceId } from '../types.js';
import { containsAny } from '../utils/text.js';

export const RELEVANCE_KEYWORDS: readonly string[] = Object.freeze([
  'nurse practitioner',
  'physician assistant',
  'midwife',
  'pmhnp',
]);

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;

const POOL_FACTOR = 5;
const MAX_POOL = 500;

export interface NormalizeOptions {
  limit: number;
  /** Omit to keep every candidate regardless of wording. */
  keywords?: readonly string[];
}

export function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) {
    return MIN_LIMIT;
  }
  return Math.min(MAX_LIMIT, Math.max(MIN_LIMIT, Math.floor(limit)));
}

/**
 * How many raw candidates to ask an extractor for. Filtering throws some
 * away, so a filtered source is asked for more than it will return.
 */
export function candidatePoolSize(limit: number, filtering: boolean): number {
  return filtering ? Math.min(MAX_POOL, limit * POOL_FACTOR) : limit;
}

export function toJobRecord(candidate: RawCandidate, source: SourceId): JobRecord {
  const record: JobRecord = {
    title: candidate.title.trim(),
    url: candidate.href,
    source,
  };
  if (candidate.location) {
    record.location = candidate.location;
  }
  if (candidate.job_number) {
    record.job_number = candidate.job_number;
  }
  return record;
}

export function isRelevant(record: Pick<JobRecord, 'title' | 'description'>, keywords: readonly string[]): boolean {
  const text = [record.title, record.description ?? ''].join(' ');
  return containsAny(text, keywords);
}

export function dedupeByUrl<T extends { url: string }>(records: T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const record of records) {
    if (seen.has(record.url)) {
      continue;
    }
    seen.add(record.url);
    out.push(record);
  }
  return out;
}

export function normalizeCandidates(
  candidates: RawCandidate[],
  source: SourceId,
  options: NormalizeOptions,
): JobRecord[] {
  const records = dedupeByUrl(
    candidates.map((candidate) => toJobRecord(candidate, source)).filter((record) => record.title.length > 0),
  );
  const { keywords } = options;
  const relevant = keywords ? records.filter((record) => isRelevant(record, keywords)) : records;
  return relevant.slice(0, clampLimit(options.limit));
}
