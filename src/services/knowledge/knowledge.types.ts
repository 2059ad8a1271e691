/**
 * Compiled, immutable knowledge tables.
 * Built once by the loader and passed into every component.
 */

import type { ChainShape, NonPlaceCategory } from '../../types/places';

export interface LevelSpec {
  minLength: number;
  maxLength: number;
  suffixes: readonly string[];
}

export interface HierarchyLevels {
  subRegion: LevelSpec;
  localityAfterSubRegion: LevelSpec;
  localityAfterRegion: LevelSpec;
  city: LevelSpec;
  ward: LevelSpec;
}

export interface BoundaryConfig {
  characters: string;
  properNameWindow: number;
  properNameMarkers: readonly string[];
  compoundContinuations: readonly string[];
}

export interface HierarchyConfig {
  kanjiClass: string;
  levels: HierarchyLevels;
  /** Cities divided into wards; preferred when a city name sits inside a longer kanji run. */
  wardCities: readonly string[];
  confidence: Readonly<Record<ChainShape, number>>;
  boundary: BoundaryConfig;
}

export type ContextRuleCategory = Exclude<NonPlaceCategory, 'person'>;

export interface ContextRule {
  source: string;
  pattern: RegExp;
  category: ContextRuleCategory;
  confidence: number;
}

/**
 * A pattern that may reference the candidate through `{place}`.
 * Templated patterns are compiled per candidate.
 */
export interface IndicatorPattern {
  source: string;
  templated: boolean;
  compiled: RegExp | null;
}

export interface IndicatorScoring {
  defaultPlaceBias: number;
  personFloor: number;
  baseConfidence: number;
  perIndicator: number;
  maxConfidence: number;
  noIndicatorConfidence: number;
}

export interface IndicatorCatalogue {
  place: readonly IndicatorPattern[];
  person: readonly IndicatorPattern[];
  historical: readonly IndicatorPattern[];
  scoring: IndicatorScoring;
}

export interface AmbiguousPlace {
  personLikelihood: number;
  modernPlace: string;
}

export interface AmbiguousTable {
  personThreshold: number;
  personLikelihoodFloor: number;
  classificationConfidence: number;
  places: ReadonlyMap<string, AmbiguousPlace>;
}

export interface ClassicalPlace {
  classicalUsage: string;
  modernRegion: string;
  latitude: number;
  longitude: number;
  keywords: readonly string[];
}

export interface ClassicalTable {
  provinceMarker: string;
  classificationConfidence: number;
  places: ReadonlyMap<string, ClassicalPlace>;
}

export interface GazetteerEntry {
  latitude: number;
  longitude: number;
  region: string;
}

export interface Gazetteer {
  id: string;
  confidence: number;
  entries: ReadonlyMap<string, GazetteerEntry>;
}

export interface SourceProfile {
  name: string;
  /** Lower wins */
  priority: number;
  trustThreshold: number;
  baseReliability: number;
}

export type FallbackCategory = Exclude<NonPlaceCategory, 'person' | 'building_part'>;

export interface ExtractorSettings {
  profiles: ReadonlyMap<string, SourceProfile>;
  classification: {
    classifyTrustedSources: boolean;
    placeMultiplier: number;
    nonPlaceMultiplier: number;
  };
  fallback: {
    confidenceMultiplier: number;
    denyList: ReadonlyMap<string, FallbackCategory>;
  };
}

export interface KnowledgeBase {
  regions: readonly string[];
  hierarchy: HierarchyConfig;
  contextRules: readonly ContextRule[];
  indicators: IndicatorCatalogue;
  ambiguous: AmbiguousTable;
  classical: ClassicalTable;
  gazetteers: readonly Gazetteer[];
  extractors: ExtractorSettings;
}

export const KNOWLEDGE_FILES = {
  regions: 'regions.json',
  hierarchy: 'hierarchy.json',
  contextRules: 'context-rules.json',
  indicators: 'indicators.json',
  ambiguous: 'ambiguous-places.json',
  classical: 'classical-places.json',
  gazetteers: 'gazetteers.json',
  extractors: 'extractors.json',
} as const;

export type KnowledgeTableName = keyof typeof KNOWLEDGE_FILES;

/** Parsed-but-unvalidated JSON, one entry per table. */
export type RawKnowledgeTables = Record<KnowledgeTableName, unknown>;
