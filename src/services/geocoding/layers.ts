/**
 * Resolution layers, tried in order by the resolver.
 */

import type { AcceptedMention } from '../../types/places';
import {
  GeocodingNotFoundError,
  GeocodingTransientError,
  toErrorMessage,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ClassicalTable, Gazetteer } from '../knowledge';
import { geocodeCacheKey } from './cache';
import type {
  GeocodeCache,
  LayerResolution,
  ProviderResult,
  ResolutionHints,
  ResolutionLayer,
} from './geocoding.types';
import type { ExternalGeocodingProvider } from './provider.interface';
import { type RateLimiter, sleep, type SleepFn } from './rateLimiter';

export class GazetteerLayer implements ResolutionLayer {
  readonly name: string;

  constructor(private readonly gazetteer: Gazetteer) {
    this.name = gazetteer.id;
  }

  async tryResolve(mention: AcceptedMention): Promise<LayerResolution | null> {
    const entry = this.gazetteer.entries.get(mention.placeName);
    if (!entry) return null;
    return {
      canonicalName: mention.placeName,
      latitude: entry.latitude,
      longitude: entry.longitude,
      confidence: this.gazetteer.confidence,
      source: this.gazetteer.id,
      region: entry.region,
    };
  }
}

export class ClassicalLayer implements ResolutionLayer {
  readonly name = 'classical';

  constructor(private readonly table: ClassicalTable) {}

  async tryResolve(mention: AcceptedMention): Promise<LayerResolution | null> {
    if (mention.classificationLabel !== 'historical_province') return null;

    const { places, provinceMarker } = this.table;
    const name = mention.placeName;
    const entry =
      places.get(name) ??
      (name.endsWith(provinceMarker) ? places.get(name.slice(0, -provinceMarker.length)) : undefined);
    if (!entry) return null;

    return {
      canonicalName: entry.modernRegion,
      latitude: entry.latitude,
      longitude: entry.longitude,
      confidence: this.table.classificationConfidence,
      source: this.name,
      region: entry.modernRegion,
    };
  }
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
}

export class ExternalProviderLayer implements ResolutionLayer {
  readonly name: string;

  /** Lookups in progress, shared by concurrent mentions of the same key */
  private readonly inFlight = new Map<string, Promise<ProviderResult | null>>();

  constructor(
    private readonly provider: ExternalGeocodingProvider,
    private readonly cache: GeocodeCache,
    private readonly limiter: RateLimiter,
    private readonly retry: RetryOptions,
    private readonly sleepFn: SleepFn = sleep
  ) {
    this.name = `${provider.name}_with_context`;
  }

  async tryResolve(
    mention: AcceptedMention,
    hints: ResolutionHints
  ): Promise<LayerResolution | null> {
    const key = geocodeCacheKey(mention.placeName, hints.regionHint);

    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = this.lookupAndCache(key, mention, hints).finally(() => {
        this.inFlight.delete(key);
      });
      this.inFlight.set(key, pending);
    }

    const result = await pending;
    return result ? this.toResolution(result) : null;
  }

  /** Cache read, provider lookup and cache write for one key. */
  private async lookupAndCache(
    key: string,
    mention: AcceptedMention,
    hints: ResolutionHints
  ): Promise<ProviderResult | null> {
    const cached = await this.cache.get(key);
    if (cached) {
      return cached.result;
    }

    const outcome = await this.lookupWithRetries(mention, hints);
    if (outcome.settled) {
      await this.cache.set(key, {
        result: outcome.result,
        documentId: mention.documentId,
        sentenceText: mention.sentenceText,
        cachedAt: new Date().toISOString(),
      });
    }
    return outcome.result;
  }

  /**
   * `settled` is false when every attempt failed transiently; such outcomes
   * are not cached.
   */
  private async lookupWithRetries(
    mention: AcceptedMention,
    hints: ResolutionHints
  ): Promise<{ result: ProviderResult | null; settled: boolean }> {
    const query = { placeName: mention.placeName, regionHint: hints.regionHint };

    for (let attemptNumber = 1; attemptNumber <= this.retry.attempts; attemptNumber += 1) {
      try {
        const result = await this.limiter.schedule(() => this.provider.geocode(query));
        return { result, settled: true };
      } catch (error) {
        if (error instanceof GeocodingNotFoundError) {
          return { result: null, settled: true };
        }
        if (!(error instanceof GeocodingTransientError)) {
          logger.error(
            { provider: this.provider.name, placeName: mention.placeName, error: toErrorMessage(error) },
            'Geocoding provider failed'
          );
          return { result: null, settled: false };
        }
        if (attemptNumber < this.retry.attempts) {
          const backoffDelayMs = this.retry.baseDelayMs * 2 ** (attemptNumber - 1);
          logger.debug(
            { provider: this.provider.name, attemptNumber, backoffDelayMs, error: error.message },
            'Transient geocoding failure, retrying'
          );
          await this.sleepFn(backoffDelayMs);
          continue;
        }
        logger.warn(
          { provider: this.provider.name, placeName: mention.placeName, error: error.message },
          'Geocoding retries exhausted'
        );
      }
    }

    return { result: null, settled: false };
  }

  private toResolution(result: ProviderResult): LayerResolution {
    return {
      canonicalName: result.canonicalName,
      latitude: result.latitude,
      longitude: result.longitude,
      confidence: result.confidence,
      source: this.name,
    };
  }
}
