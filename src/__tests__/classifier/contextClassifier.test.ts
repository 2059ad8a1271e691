import { describe, expect, test } from 'vitest';
import {
  buildFullContext,
  ContextClassifier,
  degradedClassification,
} from '../../services/contextClassifier';
import { ClassificationError } from '../../utils/errors';
import { createContext, getTestKnowledge } from '../helpers';

describe('ContextClassifier', () => {
  const knowledge = getTestKnowledge();
  const classifier = new ContextClassifier(knowledge);

  describe('context rules', () => {
    test('recognizes a plant', () => {
      const result = classifier.classify('萩', createContext('大きな萩が人の背より高く延びていた。'));

      expect(result.isPlace).toBe(false);
      expect(result.category).toBe('plant');
      expect(result.confidence).toBe(0.9);
      expect(result.reasoning).toContain('萩が人の背より高く延びて');
    });

    test('recognizes a direction', () => {
      const result = classifier.classify('東', createContext('彼は東へ向かって歩いた。'));

      expect(result).toMatchObject({ isPlace: false, category: 'direction', confidence: 0.95 });
    });

    test('recognizes a generic noun', () => {
      const result = classifier.classify('都', createContext('都の暮らしに疲れた。'));

      expect(result).toMatchObject({ isPlace: false, category: 'generic_noun', confidence: 0.8 });
    });

    test('ignores a rule match that does not contain the candidate', () => {
      const result = classifier.classify('松本', createContext('松本へ行くと、東へ道が続いていた。'));

      expect(result.isPlace).toBe(true);
    });

    test('looks at the surrounding text too', () => {
      const result = classifier.classify(
        '萩',
        createContext('萩が', { afterText: '見事に咲いていた。' })
      );

      expect(result.category).toBe('plant');
    });
  });

  describe('indicator scoring', () => {
    test('uses ambiguous-name override for a person reading', () => {
      const result = classifier.classify('柏', createContext('柏さんが笑って答えた。'));

      expect(result).toMatchObject({ isPlace: false, category: 'person', confidence: 0.8 });
    });

    test('maps a classical province with a keyword in context', () => {
      const result = classifier.classify('伊勢', createContext('伊勢の神宮に参拝した。'));

      expect(result).toMatchObject({
        isPlace: true,
        category: 'historical_province',
        confidence: 0.9,
        suggestedModernRegion: '三重県伊勢市',
      });
      expect(result.reasoning).toContain('"神宮"');
    });

    test('maps a province written with its marker', () => {
      const result = classifier.classify('薩摩国', createContext('かつての薩摩国は遠かった。'));

      expect(result.category).toBe('historical_province');
    });

    test('scores place indicators', () => {
      const result = classifier.classify('松本', createContext('松本へ行き、松本に滞在した。'));

      expect(result.isPlace).toBe(true);
      expect(result.category).toBe('place');
      expect(result.confidence).toBeCloseTo(0.9);
    });

    test('falls back to the no-indicator confidence', () => {
      const result = classifier.classify('田原', createContext('雨の日の午後、田原を思い出した。'));

      expect(result).toMatchObject({ isPlace: true, category: 'place', confidence: 0.7 });
    });

    test('classifies a strongly person-like name as a person', () => {
      const result = classifier.classify(
        '田中',
        createContext('田中が笑った。田中の顔を見て、田中さんと話した。')
      );

      expect(result.isPlace).toBe(false);
      expect(result.category).toBe('person');
      expect(result.confidence).toBeCloseTo(0.9);
    });

    test('counts each indicator once', () => {
      const scores = classifier.scoreIndicators('松本', '松本へ行き、松本に滞在した。');

      expect(scores).toEqual({ place: 3, person: 0, historical: 0 });
    });
  });

  test('throws on an empty candidate', () => {
    expect(() => classifier.classify(' ', createContext('何もない。'))).toThrow(ClassificationError);
  });

  test('joins the non-empty context parts with spaces', () => {
    expect(
      buildFullContext({ beforeText: '前', sentenceText: '文', afterText: '' })
    ).toBe('前 文');
  });
});

describe('degradedClassification', () => {
  const { fallback } = getTestKnowledge().extractors;

  test('marks deny-listed words as non-place', () => {
    expect(degradedClassification('梅', fallback)).toMatchObject({
      isPlace: false,
      category: 'plant',
    });
  });

  test('marks one-character tokens as non-place', () => {
    expect(degradedClassification('谷', fallback)).toMatchObject({
      isPlace: false,
      category: 'unknown',
    });
  });

  test('keeps longer tokens as places', () => {
    expect(degradedClassification('船橋', fallback)).toMatchObject({
      isPlace: true,
      category: 'place',
    });
  });
});
