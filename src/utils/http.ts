import { FetchError } from '../errors.js';
import type { FetchResult } from '../types.js';

export const SCRAPER_USER_AGENT = 'Mozilla/5.0 (compatible; JobScraper/1.0; +http://example.com/bot)';

interface RequestOptions {
  timeoutMs?: number;
  maxBytes?: number;
  headers?: Record<string, string>;
}

function normalizeHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

function mergeHeaders(...headersList: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const headers of headersList) {
    if (!headers) {
      continue;
    }
    for (const [key, value] of Object.entries(headers)) {
      merged[key] = value;
    }
  }
  return merged;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Static-mode transport: one GET per call, no retries. Redirects are followed
 * by `fetch` itself; whatever status remains at the end of the chain decides
 * success.
 */
export class HttpClient {
  private readonly defaultTimeoutMs: number;

  constructor(defaultTimeoutMs = 20000) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  async request(url: string, options: RequestOptions = {}): Promise<FetchResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal,
        headers: mergeHeaders(
          {
            'user-agent': SCRAPER_USER_AGENT,
            accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          },
          options.headers,
        ),
      });

      const headers = normalizeHeaders(response.headers);
      const text = await response.text();
      const maxBytes = options.maxBytes ?? 5_000_000;

      return {
        status: response.status,
        url: response.url || url,
        headers,
        body: text.length > maxBytes ? text.slice(0, maxBytes) : text,
        contentType: headers['content-type'] ?? '',
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchError(`Request to ${url} timed out after ${timeoutMs}ms`, url);
      }
      throw new FetchError(`Request to ${url} failed: ${String(error)}`, url);
    } finally {
      clearTimeout(timeout);
    }
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const result = await this.request(url, options);
    if (!isSuccessStatus(result.status)) {
      throw new FetchError(`HTTP ${result.status} for ${url}`, url, result.status);
    }
    return result.body;
  }
}
