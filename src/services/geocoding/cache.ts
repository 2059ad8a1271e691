/**
 * Corpus-wide memo of external geocoding outcomes.
 * Last writer wins. Each entry keeps the sentence that triggered the lookup
 * for auditing.
 */

import { z } from 'zod';
import { logger } from '../../utils/logger';
import type { CachedOutcome, GeocodeCache } from './geocoding.types';

const KEY_PREFIX = 'geocode:';

export function geocodeCacheKey(placeName: string, regionHint: string | null): string {
  const name = placeName.normalize('NFKC').trim();
  const hint = regionHint ? regionHint.normalize('NFKC').trim() : '';
  return `${KEY_PREFIX}${name}|${hint}`;
}

export class InMemoryGeocodeCache implements GeocodeCache {
  private readonly entries = new Map<string, CachedOutcome>();

  async get(key: string): Promise<CachedOutcome | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, outcome: CachedOutcome): Promise<void> {
    this.entries.set(key, outcome);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** The subset of an ioredis client the cache needs. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

const cachedOutcomeSchema = z.object({
  result: z
    .object({
      canonicalName: z.string(),
      latitude: z.number(),
      longitude: z.number(),
      confidence: z.number(),
    })
    .nullable(),
  documentId: z.string(),
  sentenceText: z.string(),
  cachedAt: z.string(),
});

export class RedisGeocodeCache implements GeocodeCache {
  constructor(private readonly client: RedisLike) {}

  async get(key: string): Promise<CachedOutcome | null> {
    try {
      const cached = await this.client.get(key);
      if (!cached) return null;
      const parsed = cachedOutcomeSchema.safeParse(JSON.parse(cached));
      if (!parsed.success) {
        logger.warn({ key }, 'Discarding malformed geocode cache entry');
        return null;
      }
      logger.debug({ key }, 'Geocode cache hit');
      return parsed.data;
    } catch (error) {
      logger.error({ error, key }, 'Failed to read geocode cache');
      return null;
    }
  }

  async set(key: string, outcome: CachedOutcome): Promise<void> {
    try {
      await this.client.set(key, JSON.stringify(outcome));
    } catch (error) {
      logger.error({ error, key }, 'Failed to write geocode cache');
    }
  }
}
