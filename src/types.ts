export type SourceId = 'titanplacementgroup' | 'npnow';

export type FetchMode = 'static' | 'rendered';

export interface RawCandidate {
  title: string;
  href: string;
  location?: string;
  job_number?: string;
}

export interface JobDetails {
  description?: string;
  location?: string;
  salary?: string;
  requirements?: string;
  company_info?: string;
}

export interface JobRecord extends JobDetails {
  title: string;
  url: string;
  source: SourceId;
  job_number?: string;
  details_error?: string;
}

export interface ErrorRecord {
  error: string;
  error_type: string;
  source: string;
}

export type ScrapeResultItem = JobRecord | ErrorRecord;

export interface SourceDescriptor {
  source_id: SourceId;
  listing_url: string;
  supports_detail_fetch: boolean;
  fetch_mode: FetchMode;
  relevance_filter: boolean;
}

export interface FetchResult {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
  contentType: string;
}

export function isErrorRecord(item: ScrapeResultItem): item is ErrorRecord {
  return 'error' in item && typeof item.error === 'string' && item.error.length > 0;
}
