import type { RenderWaits } from '../config.js';
import { DetailFetchError, describeError } from '../errors.js';
import type { JobDetails, JobRecord } from '../types.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import type { PageFetcher } from '../utils/fetcher.js';
import { logSafely } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface EnrichOptions {
  fetcher: PageFetcher;
  extractDetails: (html: string) => JobDetails;
  logger: Logger;
  concurrency?: number;
  waits?: RenderWaits;
}

const DETAIL_FIELDS: ReadonlyArray<keyof JobDetails> = [
  'description',
  'location',
  'salary',
  'requirements',
  'company_info',
];

export function mergeDetails(record: JobRecord, details: JobDetails): JobRecord {
  for (const field of DETAIL_FIELDS) {
    const value = details[field];
    if (value !== undefined && value !== '') {
      record[field] = value;
    }
  }
  return record;
}

async function fetchDetails(record: JobRecord, options: EnrichOptions): Promise<JobDetails> {
  try {
    const html = await options.fetcher.fetch(record.url, 'rendered', { waits: options.waits });
    return options.extractDetails(html);
  } catch (error) {
    throw new DetailFetchError(describeError(error).message, record.url);
  }
}

/**
 * Fetches each record's own page and merges whatever detail fields it
 * carries. A failed page marks only its own record with `details_error`.
 * Output order is the input order, whatever order the fetches finish in.
 */
export async function enrichWithDetails(
  records: JobRecord[],
  shouldFetch: boolean,
  options: EnrichOptions,
): Promise<JobRecord[]> {
  if (!shouldFetch || records.length === 0) {
    return records;
  }

  await logSafely(options.logger.info(`Fetching details for ${records.length} jobs`));

  return mapWithConcurrency(records, options.concurrency ?? 1, async (record) => {
    let details: JobDetails;
    try {
      details = await fetchDetails(record, options);
    } catch (error) {
      const { message } = describeError(error);
      record.details_error = message;
      await logSafely(options.logger.error(`Error fetching details for ${record.url}: ${message}`));
      return record;
    }
    await logSafely(options.logger.info(`Fetched details from ${record.url}`));
    return mergeDetails(record, details);
  });
}
