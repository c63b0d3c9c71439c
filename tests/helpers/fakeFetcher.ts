import { FetchError } from '../../src/errors.js';
import type { FetchMode } from '../../src/types.js';
import type { PageFetcher } from '../../src/utils/fetcher.js';

export class FakeFetcher implements PageFetcher {
  readonly calls: Array<{ url: string; mode: FetchMode }> = [];

  constructor(
    private readonly pages: Record<string, string>,
    private readonly delayMs: (url: string) => number = () => 0,
  ) {}

  async fetch(url: string, mode: FetchMode): Promise<string> {
    this.calls.push({ url, mode });
    const delay = this.delayMs(url);
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const html = this.pages[url];
    if (html === undefined) {
      throw new FetchError(`HTTP 404 for ${url}`, url, 404);
    }
    return html;
  }
}
