/**
 * Shared types for place-mention extraction, classification and geocoding.
 * Used by the extractors, the coordinator, the resolver and the pipeline.
 */

export interface Span {
  start: number;
  end: number;
}

export interface SentenceContext {
  documentId: string;
  sentenceText: string;
  beforeText: string;
  afterText: string;
}

export type ChainShape =
  | 'region_subregion_locality'
  | 'region_locality'
  | 'locality_ward';

export type CandidateCategory = ChainShape | 'ner_candidate';

export interface Candidate {
  readonly text: string;
  readonly span: Readonly<Span>;
  readonly sourceMethod: string;
  /** In [0, 1] */
  readonly baseConfidence: number;
  readonly sentenceText: string;
  readonly beforeText: string;
  readonly afterText: string;
  readonly category: CandidateCategory;
}

export type NonPlaceCategory =
  | 'person'
  | 'direction'
  | 'plant'
  | 'building_part'
  | 'generic_noun';

export type PlaceCategory = 'place' | 'historical_province';

export type ClassificationCategory = PlaceCategory | NonPlaceCategory | 'unknown';

export const PLACE_CATEGORIES: readonly ClassificationCategory[] = [
  'place',
  'historical_province',
];

export function isPlaceCategory(category: ClassificationCategory): category is PlaceCategory {
  return PLACE_CATEGORIES.includes(category);
}

export interface Classification {
  isPlace: boolean;
  confidence: number;
  category: ClassificationCategory;
  reasoning: string;
  suggestedModernRegion?: string;
}

export interface AcceptedMention {
  documentId: string;
  placeName: string;
  span: Span;
  confidence: number;
  sourceMethod: string;
  classificationLabel: ClassificationCategory;
  reasoning: string;
  sentenceText: string;
  contextBefore: string;
  contextAfter: string;
  suggestedModernRegion?: string;
}

export interface GeocodedRecord {
  documentId: string;
  placeName: string;
  span: Span;
  canonicalName: string;
  latitude: number | null;
  longitude: number | null;
  /** mention confidence x layer confidence, clamped to [0, 1] */
  confidence: number;
  resolutionSource: string;
  regionHint: string | null;
  sentenceText: string;
}
