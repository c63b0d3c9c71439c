import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { SOURCE_IDS } from '../adapters/index.js';
import { scrapeAll, scrapeWithDetails } from '../pipeline/scrape.js';
import type { ScrapeContext } from '../pipeline/scrape.js';
import { isErrorRecord } from '../types.js';
import type { ScrapeResultItem, SourceId } from '../types.js';
import { QueryParamError, parseFlag, parseLimit } from './params.js';

export const API_VERSION = '2.0.0';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function sourcesWithoutErrors(sourceIds: readonly SourceId[], jobs: ScrapeResultItem[]): SourceId[] {
  const failed = new Set(jobs.filter(isErrorRecord).map((item) => item.source));
  return sourceIds.filter((sourceId) => !failed.has(sourceId));
}

export function createApp(ctx: ScrapeContext, sourceIds: readonly SourceId[] = SOURCE_IDS) {
  const app = express();

  app.use((req, _res, next) => {
    ctx.logger.info(`${req.method} ${req.path}`).then(() => next(), next);
  });

  app.get('/', (_req, res) => {
    res.json({
      message: `Job Scraper API v${API_VERSION}`,
      version: API_VERSION,
      features: ['Multi-source scraping', 'Optional detail fetching', 'Modular architecture'],
      endpoints: {
        titan_jobs: '/jobs/titan',
        npnow_jobs: '/jobs/npnow',
        all_jobs: '/jobs/all',
        health: '/health',
      },
    });
  });

  app.get(
    '/jobs/titan',
    asyncRoute(async (req, res) => {
      const limit = parseLimit(req.query.limit);
      const details = parseFlag(req.query.details);
      const jobs = await scrapeWithDetails(ctx, 'titanplacementgroup', limit, details);
      res.json({ source: 'titanplacementgroup', count: jobs.length, details_fetched: details, jobs });
    }),
  );

  app.get(
    '/jobs/npnow',
    asyncRoute(async (req, res) => {
      const limit = parseLimit(req.query.limit);
      const jobs = await scrapeWithDetails(ctx, 'npnow', limit, false);
      res.json({ source: 'npnow', count: jobs.length, jobs });
    }),
  );

  app.get(
    '/jobs/all',
    asyncRoute(async (req, res) => {
      const limit = parseLimit(req.query.limit);
      const details = parseFlag(req.query.details);
      const jobs = await scrapeAll(ctx, limit, details, sourceIds);
      res.json({
        sources: sourcesWithoutErrors(sourceIds, jobs),
        total_count: jobs.length,
        details_fetched: details,
        jobs,
      });
    }),
  );

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      scrapers: ['titan', 'npnow'],
      features: { detail_scraping: ['titan'] },
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof QueryParamError) {
      res.status(400).json({ error: 'Invalid query parameter', detail: err.message });
      return;
    }
    const respond = (): void => {
      res.status(500).json({ error: err.message });
    };
    ctx.logger.error(`Unhandled API error: ${String(err)}`).then(respond, (logError: unknown) => {
      process.stderr.write(`Logging failed: ${String(logError)}\n`);
      respond();
    });
  });

  return app;
}
