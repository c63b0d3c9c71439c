import type { AppConfig } from './config.js';
import type { ScrapeContext } from './pipeline/scrape.js';
import { BrowserRenderer } from './utils/browser.js';
import type { BrowserLauncher } from './utils/browser.js';
import { DefaultPageFetcher } from './utils/fetcher.js';
import { HttpClient } from './utils/http.js';
import type { Logger } from './utils/logger.js';

export function createScrapeContext(config: AppConfig, logger: Logger, launch?: BrowserLauncher): ScrapeContext {
  const httpClient = new HttpClient(config.httpTimeoutMs);
  const renderer = new BrowserRenderer(config.render, logger, launch);
  return {
    fetcher: new DefaultPageFetcher(httpClient, renderer, logger),
    logger,
    config,
  };
}
