import type { JobDetails, RawCandidate } from '../types.js';
import { CLINICAL_KEYWORDS, collectJobPathCandidates, firstText, loadDocument } from './common.js';
import type { Extractor } from './common.js';

export const TITAN_LISTING_URL = 'https://jobs.crelate.com/portal/titanplacementgroup';

const DESCRIPTION_SELECTORS = ['div.job-description', 'div.description', 'div#job-description', 'div.job-details'];
const LOCATION_SELECTORS = ['span.location', 'div.job-location'];
const SALARY_SELECTORS = ['span.salary', 'div.compensation'];
const REQUIREMENTS_SELECTORS = ['div.requirements', 'div.qualifications'];
const COMPANY_SELECTORS = ['div.company-info'];

export function extractTitanCandidates(html: string, baseUrl: string, limit: number): RawCandidate[] {
  const $ = loadDocument(html);
  return collectJobPathCandidates($, baseUrl, limit, {
    jobPathMarkers: ['/job/'],
    fallbackPathMarkers: ['/job/', '/portal/'],
    blockKeywords: CLINICAL_KEYWORDS,
    jobNumberMarker: '/job/',
  });
}

export function extractTitanDetails(html: string): JobDetails {
  const $ = loadDocument(html);
  const lookups: Array<[keyof JobDetails, string[]]> = [
    ['description', DESCRIPTION_SELECTORS],
    ['location', LOCATION_SELECTORS],
    ['salary', SALARY_SELECTORS],
    ['requirements', REQUIREMENTS_SELECTORS],
    ['company_info', COMPANY_SELECTORS],
  ];

  const details: JobDetails = {};
  for (const [field, selectors] of lookups) {
    const value = firstText($, selectors);
    if (value !== undefined) {
      details[field] = value;
    }
  }
  return details;
}

export const titanExtractor: Extractor = {
  source: 'titanplacementgroup',
  extract: extractTitanCandidates,
  extractDetails: extractTitanDetails,
};
