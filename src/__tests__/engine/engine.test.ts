import { describe, expect, test } from 'vitest';
import { createPlaceEngine } from '../../engine';
import { parseKnowledgeBase, readKnowledgeTables, DEFAULT_KNOWLEDGE_DIR } from '../../services/knowledge';
import { DrizzleResultSink, InMemoryResultSink } from '../../services/sink';
import { ConfigurationError } from '../../utils/errors';
import { createContext, FakeGeocodingProvider, getTestKnowledge } from '../helpers';

describe('createPlaceEngine', () => {
  test('wires the recognizer in as a second strategy', async () => {
    const engine = createPlaceEngine({
      knowledge: getTestKnowledge(),
      provider: null,
      nerSource: {
        extract: (_documentId, sentenceText) => [
          { text: '松本', start: sentenceText.indexOf('松本'), end: sentenceText.indexOf('松本') + 2 },
        ],
      },
    });

    const { mentions } = await engine.coordinator.coordinate(createContext('松本へ行った。'));

    expect(mentions.map((m) => [m.placeName, m.sourceMethod])).toEqual([['松本', 'ner']]);
    await engine.close();
  });

  test('omits the external layer when no provider is wanted', () => {
    const engine = createPlaceEngine({ knowledge: getTestKnowledge(), provider: null });

    expect(engine.resolver.layers.map((layer) => layer.name)).not.toContain('nominatim_with_context');
    expect(engine.sink).toBeInstanceOf(InMemoryResultSink);
  });

  test('adds the given provider as the last layer', () => {
    const engine = createPlaceEngine({
      knowledge: getTestKnowledge(),
      provider: new FakeGeocodingProvider(),
    });

    expect(engine.resolver.layers.at(-1)?.name).toBe('fake_with_context');
  });

  test('requires a recognizer profile when a recognizer is given', () => {
    const raw = readKnowledgeTables(DEFAULT_KNOWLEDGE_DIR);
    const knowledge = parseKnowledgeBase({
      ...raw,
      extractors: {
        version: 1,
        profiles: { pattern: { priority: 1, trustThreshold: 0.6, baseReliability: 0.95 } },
        classification: { classifyTrustedSources: false, placeMultiplier: 1.2, nonPlaceMultiplier: 0.3 },
        fallback: { confidenceMultiplier: 0.8, denyList: { direction: [], plant: [], generic_noun: [] } },
      },
    });

    expect(() =>
      createPlaceEngine({ knowledge, provider: null, nerSource: { extract: () => [] } })
    ).toThrow(ConfigurationError);
  });

  test('stores results in Postgres when asked to persist', async () => {
    const engine = createPlaceEngine({ knowledge: getTestKnowledge(), provider: null, persist: true });

    expect(engine.sink).toBeInstanceOf(DrizzleResultSink);
    await engine.close();
  });
});
