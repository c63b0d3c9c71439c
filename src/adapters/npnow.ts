import type { RawCandidate } from '../types.js';
import { collectSameHostLinks, loadDocument, NON_JOB_PATHS } from './common.js';
import type { Extractor } from './common.js';

export const NPNOW_LISTING_URL = 'https://www.npnow.com/current-openings';

// The openings page is a plain list of links to posting pages on the same
// host; relevance filtering downstream removes the remaining site chrome.
export function extractNpnowCandidates(html: string, baseUrl: string, limit: number): RawCandidate[] {
  return collectSameHostLinks(loadDocument(html), baseUrl, limit, NON_JOB_PATHS);
}

export const npnowExtractor: Extractor = {
  source: 'npnow',
  extract: extractNpnowCandidates,
};
