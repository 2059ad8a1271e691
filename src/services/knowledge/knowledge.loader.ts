/**
 * Knowledge base loading.
 *
 * Reads the versioned JSON tables, validates them, compiles every pattern and
 * returns a frozen KnowledgeBase. Any defect is a ConfigurationError: running
 * with a partial table would silently suppress a whole category of matches.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ZodType, ZodTypeDef } from 'zod';
import { env } from '../../config/env';
import { ConfigurationError, toErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import {
  ambiguousFileSchema,
  classicalFileSchema,
  contextRulesFileSchema,
  extractorsFileSchema,
  gazetteersFileSchema,
  hierarchyFileSchema,
  indicatorsFileSchema,
  regionsFileSchema,
} from './knowledge.schemas';
import type {
  AmbiguousPlace,
  ClassicalPlace,
  ContextRule,
  FallbackCategory,
  Gazetteer,
  GazetteerEntry,
  IndicatorPattern,
  KnowledgeBase,
  KnowledgeTableName,
  RawKnowledgeTables,
  SourceProfile,
} from './knowledge.types';
import { KNOWLEDGE_FILES } from './knowledge.types';

export const DEFAULT_KNOWLEDGE_DIR = fileURLToPath(new URL('../../../knowledge/', import.meta.url));

const PLACE_PLACEHOLDER = '{place}';

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function validate<Output>(
  table: KnowledgeTableName,
  schema: ZodType<Output, ZodTypeDef, unknown>,
  raw: unknown
): Output {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(KNOWLEDGE_FILES[table], issues.join('; '));
  }
  return result.data;
}

function compilePattern(table: KnowledgeTableName, source: string, flags = ''): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError(
      KNOWLEDGE_FILES[table],
      `invalid pattern "${source}": ${toErrorMessage(error)}`,
      error
    );
  }
}

function compileIndicators(sources: readonly string[]): IndicatorPattern[] {
  return sources.map((source) => {
    const templated = source.includes(PLACE_PLACEHOLDER);
    // Templated patterns are compiled per candidate; check them against a stand-in.
    const probe = compilePattern(
      'indicators',
      templated ? source.replaceAll(PLACE_PLACEHOLDER, 'X') : source
    );
    return { source, templated, compiled: templated ? null : probe };
  });
}

/**
 * Compile the pattern of a templated indicator for one candidate.
 */
export function resolveIndicator(indicator: IndicatorPattern, placeName: string): RegExp {
  if (indicator.compiled) {
    return indicator.compiled;
  }
  return new RegExp(indicator.source.replaceAll(PLACE_PLACEHOLDER, escapeRegex(placeName)));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !(value instanceof Map) && !(value instanceof RegExp)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build a KnowledgeBase from already-parsed JSON tables.
 */
export function parseKnowledgeBase(raw: RawKnowledgeTables): KnowledgeBase {
  const regions = validate('regions', regionsFileSchema, raw.regions);
  const hierarchy = validate('hierarchy', hierarchyFileSchema, raw.hierarchy);
  const rules = validate('contextRules', contextRulesFileSchema, raw.contextRules);
  const indicators = validate('indicators', indicatorsFileSchema, raw.indicators);
  const ambiguous = validate('ambiguous', ambiguousFileSchema, raw.ambiguous);
  const classical = validate('classical', classicalFileSchema, raw.classical);
  const gazetteers = validate('gazetteers', gazetteersFileSchema, raw.gazetteers);
  const extractors = validate('extractors', extractorsFileSchema, raw.extractors);

  compilePattern('hierarchy', `[${hierarchy.kanjiClass}]`);

  const contextRules: ContextRule[] = rules.rules.map((rule) => ({
    source: rule.pattern,
    pattern: compilePattern('contextRules', rule.pattern, 'g'),
    category: rule.category,
    confidence: rule.confidence,
  }));

  const ambiguousPlaces = new Map<string, AmbiguousPlace>(
    Object.entries(ambiguous.places).map(([name, entry]) => [
      name,
      {
        personLikelihood: entry.personLikelihood ?? ambiguous.defaultPersonLikelihood,
        modernPlace: entry.modernPlace,
      },
    ])
  );

  const classicalPlaces = new Map<string, ClassicalPlace>(Object.entries(classical.places));

  const seenGazetteers = new Set<string>();
  const compiledGazetteers: Gazetteer[] = gazetteers.tables.map((table) => {
    if (seenGazetteers.has(table.id)) {
      throw new ConfigurationError(KNOWLEDGE_FILES.gazetteers, `duplicate table id "${table.id}"`);
    }
    seenGazetteers.add(table.id);
    return {
      id: table.id,
      confidence: table.confidence,
      entries: new Map<string, GazetteerEntry>(Object.entries(table.entries)),
    };
  });

  const profiles = new Map<string, SourceProfile>(
    Object.entries(extractors.profiles).map(([name, profile]) => [name, { name, ...profile }])
  );

  const denyList = new Map<string, FallbackCategory>();
  const { direction, plant, generic_noun } = extractors.fallback.denyList;
  direction.forEach((word) => denyList.set(word, 'direction'));
  plant.forEach((word) => denyList.set(word, 'plant'));
  generic_noun.forEach((word) => denyList.set(word, 'generic_noun'));

  return deepFreeze<KnowledgeBase>({
    regions: [...regions.regions],
    hierarchy: {
      kanjiClass: hierarchy.kanjiClass,
      levels: hierarchy.levels,
      wardCities: [...hierarchy.wardCities],
      confidence: hierarchy.confidence,
      boundary: hierarchy.boundary,
    },
    contextRules,
    indicators: {
      place: compileIndicators(indicators.place),
      person: compileIndicators(indicators.person),
      historical: compileIndicators(indicators.historical),
      scoring: indicators.scoring,
    },
    ambiguous: {
      personThreshold: ambiguous.personThreshold,
      personLikelihoodFloor: ambiguous.personLikelihoodFloor,
      classificationConfidence: ambiguous.classificationConfidence,
      places: ambiguousPlaces,
    },
    classical: {
      provinceMarker: classical.provinceMarker,
      classificationConfidence: classical.classificationConfidence,
      places: classicalPlaces,
    },
    gazetteers: compiledGazetteers,
    extractors: {
      profiles,
      classification: extractors.classification,
      fallback: {
        confidenceMultiplier: extractors.fallback.confidenceMultiplier,
        denyList,
      },
    },
  });
}

/**
 * Read the raw JSON tables from a directory without validating them.
 */
export function readKnowledgeTables(dir: string): RawKnowledgeTables {
  const read = (table: KnowledgeTableName): unknown => {
    const file = KNOWLEDGE_FILES[table];
    let text: string;
    try {
      text = readFileSync(join(dir, file), 'utf-8');
    } catch (error) {
      throw new ConfigurationError(file, `cannot read table: ${toErrorMessage(error)}`, error);
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(file, `malformed JSON: ${toErrorMessage(error)}`, error);
    }
  };

  return {
    regions: read('regions'),
    hierarchy: read('hierarchy'),
    contextRules: read('contextRules'),
    indicators: read('indicators'),
    ambiguous: read('ambiguous'),
    classical: read('classical'),
    gazetteers: read('gazetteers'),
    extractors: read('extractors'),
  };
}

export function loadKnowledgeBase(dir: string = env.KNOWLEDGE_DIR ?? DEFAULT_KNOWLEDGE_DIR): KnowledgeBase {
  const knowledge = parseKnowledgeBase(readKnowledgeTables(dir));
  logger.info({ dir, ...describeKnowledgeBase(knowledge) }, 'Knowledge base loaded');
  return knowledge;
}

export function describeKnowledgeBase(knowledge: KnowledgeBase): Record<string, number> {
  return {
    regions: knowledge.regions.length,
    contextRules: knowledge.contextRules.length,
    placeIndicators: knowledge.indicators.place.length,
    personIndicators: knowledge.indicators.person.length,
    historicalIndicators: knowledge.indicators.historical.length,
    ambiguousPlaces: knowledge.ambiguous.places.size,
    classicalPlaces: knowledge.classical.places.size,
    gazetteerEntries: knowledge.gazetteers.reduce((sum, table) => sum + table.entries.size, 0),
    sourceProfiles: knowledge.extractors.profiles.size,
  };
}
