import type { RenderWaits } from '../config.js';
import type { FetchMode } from '../types.js';
import type { BrowserRenderer } from './browser.js';
import type { HttpClient } from './http.js';
import type { Logger } from './logger.js';

export interface FetchOptions {
  /** Rendered mode only: overrides the listing-page waits. */
  waits?: RenderWaits;
}

export interface PageFetcher {
  fetch(url: string, mode: FetchMode, options?: FetchOptions): Promise<string>;
}

export class DefaultPageFetcher implements PageFetcher {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly renderer: BrowserRenderer,
    private readonly logger: Logger,
  ) {}

  async fetch(url: string, mode: FetchMode, options: FetchOptions = {}): Promise<string> {
    if (mode === 'rendered') {
      return this.renderer.render(url, options.waits);
    }

    await this.logger.info(`Fetching ${url} with HTTP request`);
    const html = await this.httpClient.getText(url);
    await this.logger.info(`Fetched ${url} (${html.length} bytes)`);
    return html;
  }
}
