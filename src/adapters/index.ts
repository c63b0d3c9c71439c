import type { SourceDescriptor, SourceId } from '../types.js';
import type { Extractor } from './common.js';
import { NPNOW_LISTING_URL, npnowExtractor } from './npnow.js';
import { TITAN_LISTING_URL, titanExtractor } from './titan.js';

export const SOURCES: Readonly<Record<SourceId, SourceDescriptor>> = Object.freeze({
  titanplacementgroup: {
    source_id: 'titanplacementgroup',
    listing_url: TITAN_LISTING_URL,
    supports_detail_fetch: true,
    fetch_mode: 'rendered',
    relevance_filter: false,
  },
  npnow: {
    source_id: 'npnow',
    listing_url: NPNOW_LISTING_URL,
    supports_detail_fetch: false,
    fetch_mode: 'static',
    relevance_filter: true,
  },
});

const EXTRACTOR_BY_SOURCE: Readonly<Record<SourceId, Extractor>> = Object.freeze({
  titanplacementgroup: titanExtractor,
  npnow: npnowExtractor,
});

export const SOURCE_IDS: readonly SourceId[] = Object.freeze(['titanplacementgroup', 'npnow']);

export function isSourceId(value: string): value is SourceId {
  return (SOURCE_IDS as readonly string[]).includes(value);
}

export interface SourceRegistry {
  descriptor(sourceId: SourceId): SourceDescriptor;
  extractor(sourceId: SourceId): Extractor;
  ids(): readonly SourceId[];
}

export const defaultRegistry: SourceRegistry = {
  descriptor: (sourceId) => SOURCES[sourceId],
  extractor: (sourceId) => EXTRACTOR_BY_SOURCE[sourceId],
  ids: () => SOURCE_IDS,
};

export type { Extractor } from './common.js';
