import { defaultRegistry, isSourceId } from '../adapters/index.js';
import type { SourceRegistry } from '../adapters/index.js';
import type { AppConfig } from '../config.js';
import { UnknownSourceError, describeError } from '../errors.js';
import type { ErrorRecord, JobRecord, ScrapeResultItem, SourceId } from '../types.js';
import type { PageFetcher } from '../utils/fetcher.js';
import { logSafely } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { enrichWithDetails } from './enrich.js';
import { RELEVANCE_KEYWORDS, candidatePoolSize, clampLimit, normalizeCandidates } from './normalize.js';

export interface ScrapeContext {
  fetcher: PageFetcher;
  logger: Logger;
  config: AppConfig;
  registry?: SourceRegistry;
  /** Replaces the built-in relevance keywords for sources that filter. */
  keywords?: readonly string[];
}

export function toErrorRecord(error: unknown, source: string): ErrorRecord {
  const { message, type } = describeError(error);
  return { error: message, error_type: type, source };
}

async function runPipeline(
  ctx: ScrapeContext,
  sourceId: SourceId,
  limit: number,
  fetchDetails: boolean,
): Promise<JobRecord[]> {
  const registry = ctx.registry ?? defaultRegistry;
  const descriptor = registry.descriptor(sourceId);
  const extractor = registry.extractor(sourceId);
  const filtering = descriptor.relevance_filter;

  const html = await ctx.fetcher.fetch(descriptor.listing_url, descriptor.fetch_mode, {
    waits: ctx.config.render.listing,
  });
  const candidates = extractor.extract(html, descriptor.listing_url, candidatePoolSize(limit, filtering));
  const jobs = normalizeCandidates(candidates, sourceId, {
    limit,
    keywords: filtering ? (ctx.keywords ?? RELEVANCE_KEYWORDS) : undefined,
  });
  await logSafely(ctx.logger.info(`${sourceId}: ${candidates.length} candidates, ${jobs.length} jobs kept`));

  const { extractDetails } = extractor;
  if (!fetchDetails || !descriptor.supports_detail_fetch || !extractDetails) {
    return jobs;
  }

  return enrichWithDetails(jobs, true, {
    fetcher: ctx.fetcher,
    extractDetails,
    logger: ctx.logger,
    concurrency: ctx.config.detailConcurrency,
    waits: ctx.config.render.detail,
  });
}

/**
 * Never rejects: a failed source comes back as a single error record, which
 * callers can tell apart from an empty (zero-job) result.
 */
export async function scrapeWithDetails(
  ctx: ScrapeContext,
  sourceId: string,
  limit: number,
  fetchDetails: boolean,
): Promise<ScrapeResultItem[]> {
  if (!isSourceId(sourceId)) {
    return [toErrorRecord(new UnknownSourceError(`Unknown source: ${sourceId}`), sourceId)];
  }

  try {
    return await runPipeline(ctx, sourceId, clampLimit(limit), fetchDetails);
  } catch (error) {
    await logSafely(ctx.logger.error(`Error scraping ${sourceId}: ${String(error)}`));
    return [toErrorRecord(error, sourceId)];
  }
}

export async function scrape(ctx: ScrapeContext, sourceId: string, limit: number): Promise<ScrapeResultItem[]> {
  return scrapeWithDetails(ctx, sourceId, limit, false);
}

/** Every source in turn; one failing source never hides the others' jobs. */
export async function scrapeAll(
  ctx: ScrapeContext,
  limit: number,
  fetchDetails: boolean,
  sourceIds: readonly SourceId[] = (ctx.registry ?? defaultRegistry).ids(),
): Promise<ScrapeResultItem[]> {
  const results: ScrapeResultItem[] = [];
  for (const sourceId of sourceIds) {
    try {
      results.push(...(await scrapeWithDetails(ctx, sourceId, limit, fetchDetails)));
    } catch (error) {
      results.push(toErrorRecord(error, sourceId));
    }
  }
  return results;
}
