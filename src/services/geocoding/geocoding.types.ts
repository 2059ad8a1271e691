import type { AcceptedMention } from '../../types/places';

export interface ResolutionHints {
  /** Modern place string used to disambiguate an external lookup */
  regionHint: string | null;
}

export interface LayerResolution {
  canonicalName: string;
  latitude: number;
  longitude: number;
  /** Layer confidence, multiplied into the mention confidence */
  confidence: number;
  source: string;
  /** Region the layer placed the mention in, when it knows one */
  region?: string;
}

/**
 * One step of the resolution chain. Returning null passes the mention on to
 * the next layer.
 */
export interface ResolutionLayer {
  readonly name: string;
  tryResolve(mention: AcceptedMention, hints: ResolutionHints): Promise<LayerResolution | null>;
}

export interface GeocodeQuery {
  placeName: string;
  regionHint: string | null;
}

export interface ProviderResult {
  canonicalName: string;
  latitude: number;
  longitude: number;
  confidence: number;
}

export interface CachedOutcome {
  /** null records a definite not-found */
  result: ProviderResult | null;
  documentId: string;
  sentenceText: string;
  cachedAt: string;
}

export interface GeocodeCache {
  get(key: string): Promise<CachedOutcome | null>;
  set(key: string, outcome: CachedOutcome): Promise<void>;
}
