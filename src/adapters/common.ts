import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ParseError } from '../errors.js';
import type { JobDetails, RawCandidate, SourceId } from '../types.js';
import { containsAny, normalizeWhitespace } from '../utils/text.js';
import { isHttpUrl, pathnameOf, sameHost, toAbsoluteUrl } from '../utils/url.js';

export interface Extractor {
  readonly source: SourceId;
  extract(html: string, baseUrl: string, limit: number): RawCandidate[];
  /** Present only for sources whose detail pages carry extra fields. */
  extractDetails?(html: string): JobDetails;
}

export const MIN_TITLE_LENGTH = 5;

export const NAVIGATION_LABELS: ReadonlySet<string> = new Set(['home', 'about', 'contact', 'apply', 'back']);

export const CLINICAL_KEYWORDS: readonly string[] = Object.freeze([
  'practitioner',
  'physician',
  'nurse',
  'therapist',
  'dentist',
  'hygienist',
  'medical',
  'doctor',
]);

export const NON_JOB_PATHS: readonly string[] = Object.freeze([
  '/current-openings',
  '/contact',
  '/about',
  '/privacy',
  '/terms',
]);

export function loadDocument(html: string): CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (error) {
    throw new ParseError(`Could not parse markup: ${String(error)}`);
  }
}

export function isNavigationalLabel(text: string): boolean {
  return NAVIGATION_LABELS.has(text.trim().toLowerCase());
}

export function isAcceptableTitle(text: string): boolean {
  return text.length >= MIN_TITLE_LENGTH && !isNavigationalLabel(text);
}

/** `/job/12345?ref=x#top` -> `12345`. */
export function parseJobNumber(href: string, marker = '/job/'): string | undefined {
  const at = href.lastIndexOf(marker);
  if (at === -1) {
    return undefined;
  }
  const tail = href.slice(at + marker.length).split('?')[0].split('#')[0];
  return tail.length > 0 ? tail : undefined;
}

function hrefMatches(href: string, markers: readonly string[]): boolean {
  return markers.some((marker) => href.includes(marker));
}

/** First-seen-wins accumulator keyed on the resolved URL. */
class CandidateSet {
  private readonly seen = new Set<string>();
  private readonly items: RawCandidate[] = [];

  constructor(
    private readonly baseUrl: string,
    private readonly limit: number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length >= this.limit;
  }

  offer(title: string, href: string, jobNumberMarker?: string): boolean {
    if (this.isFull() || !isAcceptableTitle(title)) {
      return false;
    }

    const absolute = toAbsoluteUrl(href, this.baseUrl);
    if (this.seen.has(absolute)) {
      return false;
    }
    this.seen.add(absolute);

    const candidate: RawCandidate = { title, href: absolute };
    const jobNumber = jobNumberMarker ? parseJobNumber(href, jobNumberMarker) : undefined;
    if (jobNumber) {
      candidate.job_number = jobNumber;
    }
    this.items.push(candidate);
    return true;
  }

  toArray(): RawCandidate[] {
    return [...this.items];
  }
}

export interface JobPathOptions {
  /** Substrings that mark a job-detail href on the listing page. */
  jobPathMarkers: readonly string[];
  /** Looser markers used inside keyword blocks when the primary pass finds nothing. */
  fallbackPathMarkers: readonly string[];
  blockKeywords: readonly string[];
  jobNumberMarker?: string;
}

export function collectJobPathCandidates(
  $: CheerioAPI,
  baseUrl: string,
  limit: number,
  options: JobPathOptions,
): RawCandidate[] {
  const accepted = new CandidateSet(baseUrl, limit);

  $('a[href]').each((_, anchor) => {
    if (accepted.isFull()) {
      return false;
    }
    const href = ($(anchor).attr('href') ?? '').trim();
    if (!href || !hrefMatches(href, options.jobPathMarkers)) {
      return;
    }
    accepted.offer(normalizeWhitespace($(anchor).text()), href, options.jobNumberMarker);
  });

  if (accepted.size > 0) {
    return accepted.toArray();
  }

  // Some boards wrap each posting in a descriptive card; look inside cards that
  // mention a clinical role.
  $('div, article, section').each((_, block) => {
    if (accepted.isFull()) {
      return false;
    }
    if (!containsAny($(block).text(), options.blockKeywords)) {
      return;
    }
    $(block)
      .find('a[href]')
      .each((__, anchor) => {
        if (accepted.isFull()) {
          return false;
        }
        const href = ($(anchor).attr('href') ?? '').trim();
        if (!href || !hrefMatches(href, options.fallbackPathMarkers)) {
          return;
        }
        accepted.offer(normalizeWhitespace($(anchor).text()), href, options.jobNumberMarker);
      });
  });

  return accepted.toArray();
}

function isDeniedPath(url: string, deniedPaths: readonly string[]): boolean {
  const path = pathnameOf(url).toLowerCase().replace(/\/+$/, '');
  return deniedPaths.some((denied) => path === denied || path.startsWith(`${denied}/`));
}

/**
 * Flat anchor lists without a job-path convention: every same-host link with
 * a title that is not a known site page. No per-item fields are available.
 */
export function collectSameHostLinks(
  $: CheerioAPI,
  baseUrl: string,
  limit: number,
  deniedPaths: readonly string[] = NON_JOB_PATHS,
): RawCandidate[] {
  const seen = new Set<string>();
  const out: RawCandidate[] = [];

  $('a[href]').each((_, anchor) => {
    if (out.length >= limit) {
      return false;
    }

    const href = ($(anchor).attr('href') ?? '').trim();
    const title = normalizeWhitespace($(anchor).text());
    if (!href || title.length < MIN_TITLE_LENGTH || /^(mailto|tel):/i.test(href)) {
      return;
    }

    const absolute = toAbsoluteUrl(href, baseUrl);
    if (!isHttpUrl(absolute) || !sameHost(absolute, baseUrl) || isDeniedPath(absolute, deniedPaths)) {
      return;
    }
    if (seen.has(absolute)) {
      return;
    }

    seen.add(absolute);
    out.push({ title, href: absolute });
  });

  return out;
}

/** Text of the first element matching any selector, in selector order. */
export function firstText($: CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const element = $(selector).first();
    if (element.length === 0) {
      continue;
    }
    const text = normalizeWhitespace(element.text());
    if (text) {
      return text;
    }
  }
  return undefined;
}
