/**
 * Wires the knowledge base, extractors, classifier, coordinator, resolver and
 * sink into a ready pipeline.
 */

import { createDatabase, type DatabaseConnection } from './config/database';
import { env } from './config/env';
import { ContextClassifier } from './services/contextClassifier';
import { ExtractionCoordinator } from './services/coordinator';
import {
  type ExternalGeocodingProvider,
  type GeocodeCache,
  GeocodingResolver,
  InMemoryGeocodeCache,
  NominatimGeocodingProvider,
  RedisGeocodeCache,
} from './services/geocoding';
import { type KnowledgeBase, loadKnowledgeBase } from './services/knowledge';
import { PlacePipeline } from './services/pipeline';
import {
  type ExternalNerSource,
  type ExtractionStrategy,
  NerExtractionStrategy,
  PatternExtractor,
} from './services/placeExtraction';
import { RedisService } from './services/redis';
import type { SentenceContextOptions } from './services/sentences';
import { DrizzleResultSink, InMemoryResultSink, type ResultSink } from './services/sink';
import { ConfigurationError } from './utils/errors';
import { logger } from './utils/logger';

export const NER_PROFILE = 'ner';

export interface PlaceEngineOptions {
  knowledge?: KnowledgeBase;
  knowledgeDir?: string;
  nerSource?: ExternalNerSource;
  /** null disables the external layer; omitted uses Nominatim */
  provider?: ExternalGeocodingProvider | null;
  /** Defaults to Redis when REDIS_URL is set, otherwise in-memory */
  cache?: GeocodeCache;
  sink?: ResultSink;
  /** Store results in Postgres (DB_* variables) when no sink is given */
  persist?: boolean;
  sentences?: SentenceContextOptions;
}

export interface PlaceEngine {
  knowledge: KnowledgeBase;
  classifier: ContextClassifier;
  coordinator: ExtractionCoordinator;
  resolver: GeocodingResolver;
  pipeline: PlacePipeline;
  sink: ResultSink;
  close(): Promise<void>;
}

export function createPlaceEngine(options: PlaceEngineOptions = {}): PlaceEngine {
  const knowledge = options.knowledge ?? loadKnowledgeBase(options.knowledgeDir);

  const strategies: ExtractionStrategy[] = [new PatternExtractor(knowledge)];
  if (options.nerSource) {
    const profile = knowledge.extractors.profiles.get(NER_PROFILE);
    if (!profile) {
      throw new ConfigurationError('extractors.json', `missing "${NER_PROFILE}" source profile`);
    }
    strategies.push(new NerExtractionStrategy(options.nerSource, profile));
  }

  let redis: RedisService | null = null;
  let cache = options.cache;
  if (!cache) {
    if (env.REDIS_URL) {
      redis = new RedisService(env.REDIS_URL);
      cache = new RedisGeocodeCache(redis);
    } else {
      cache = new InMemoryGeocodeCache();
    }
  }

  const provider =
    options.provider === undefined ? new NominatimGeocodingProvider() : options.provider;

  const classifier = new ContextClassifier(knowledge);
  const coordinator = new ExtractionCoordinator(strategies, classifier, knowledge);
  const resolver = new GeocodingResolver(knowledge, provider ? { provider, cache } : {});
  let database: DatabaseConnection | null = null;
  let sink = options.sink;
  if (!sink) {
    if (options.persist) {
      database = createDatabase();
      sink = new DrizzleResultSink(database.db);
    } else {
      sink = new InMemoryResultSink();
    }
  }
  const pipeline = new PlacePipeline(coordinator, resolver, sink, options.sentences);

  logger.info(
    {
      strategies: strategies.map((strategy) => strategy.name),
      layers: resolver.layers.map((layer) => layer.name),
      sink: sink.constructor.name,
    },
    'Place engine ready'
  );

  return {
    knowledge,
    classifier,
    coordinator,
    resolver,
    pipeline,
    sink,
    async close() {
      if (redis) {
        await redis.disconnect();
      }
      if (database) {
        await database.close();
      }
    },
  };
}
