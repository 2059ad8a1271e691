/**
 * Resolves accepted mentions to coordinates through an ordered chain of
 * layers: curated gazetteers, the classical province table, then an external
 * provider. Non-place mentions are rejected before any layer runs.
 */

import { env } from '../../config/env';
import type { AcceptedMention, GeocodedRecord } from '../../types/places';
import { isPlaceCategory } from '../../types/places';
import { toErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { KnowledgeBase } from '../knowledge';
import { InMemoryGeocodeCache } from './cache';
import type {
  GeocodeCache,
  LayerResolution,
  ResolutionHints,
  ResolutionLayer,
} from './geocoding.types';
import {
  ClassicalLayer,
  ExternalProviderLayer,
  GazetteerLayer,
  type RetryOptions,
} from './layers';
import type { ExternalGeocodingProvider } from './provider.interface';
import { RateLimiter, type SleepFn, sleep } from './rateLimiter';

export const REJECTED_SOURCE = 'rejected';
export const FAILED_SOURCE = 'failed';

export interface GeocodingResolverOptions {
  provider?: ExternalGeocodingProvider;
  cache?: GeocodeCache;
  requestDelayMs?: number;
  retry?: Partial<RetryOptions>;
  sleep?: SleepFn;
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class GeocodingResolver {
  readonly layers: readonly ResolutionLayer[];

  constructor(
    private readonly knowledge: KnowledgeBase,
    options: GeocodingResolverOptions = {}
  ) {
    const layers: ResolutionLayer[] = knowledge.gazetteers.map(
      (gazetteer) => new GazetteerLayer(gazetteer)
    );
    layers.push(new ClassicalLayer(knowledge.classical));

    if (options.provider) {
      const sleepFn = options.sleep ?? sleep;
      layers.push(
        new ExternalProviderLayer(
          options.provider,
          options.cache ?? new InMemoryGeocodeCache(),
          new RateLimiter(options.requestDelayMs ?? env.GEOCODER_REQUEST_DELAY_MS, sleepFn),
          {
            attempts: options.retry?.attempts ?? env.GEOCODER_RETRY_ATTEMPTS,
            baseDelayMs: options.retry?.baseDelayMs ?? env.GEOCODER_RETRY_BASE_DELAY_MS,
          },
          sleepFn
        )
      );
    }

    this.layers = layers;
  }

  /** Region hint from the ambiguous table, else the classifier's suggestion. */
  hintsFor(mention: AcceptedMention): ResolutionHints {
    const ambiguous = this.knowledge.ambiguous.places.get(mention.placeName);
    return {
      regionHint: ambiguous?.modernPlace ?? mention.suggestedModernRegion ?? null,
    };
  }

  async resolve(mention: AcceptedMention): Promise<GeocodedRecord> {
    if (!isPlaceCategory(mention.classificationLabel)) {
      logger.debug(
        { placeName: mention.placeName, label: mention.classificationLabel },
        'Mention rejected before geocoding'
      );
      return this.unresolved(mention, REJECTED_SOURCE, null);
    }

    const hints = this.hintsFor(mention);

    for (const layer of this.layers) {
      let resolution: LayerResolution | null;
      try {
        resolution = await layer.tryResolve(mention, hints);
      } catch (error) {
        logger.error(
          { layer: layer.name, placeName: mention.placeName, error: toErrorMessage(error) },
          'Resolution layer failed'
        );
        continue;
      }
      if (!resolution) continue;

      return {
        documentId: mention.documentId,
        placeName: mention.placeName,
        span: { start: mention.span.start, end: mention.span.end },
        canonicalName: resolution.canonicalName,
        latitude: resolution.latitude,
        longitude: resolution.longitude,
        confidence: clamp(mention.confidence * resolution.confidence),
        resolutionSource: resolution.source,
        regionHint: resolution.region ?? hints.regionHint,
        sentenceText: mention.sentenceText,
      };
    }

    return this.unresolved(mention, FAILED_SOURCE, hints.regionHint);
  }

  private unresolved(
    mention: AcceptedMention,
    source: string,
    regionHint: string | null
  ): GeocodedRecord {
    return {
      documentId: mention.documentId,
      placeName: mention.placeName,
      span: { start: mention.span.start, end: mention.span.end },
      canonicalName: mention.placeName,
      latitude: null,
      longitude: null,
      confidence: 0,
      resolutionSource: source,
      regionHint,
      sentenceText: mention.sentenceText,
    };
  }
}
