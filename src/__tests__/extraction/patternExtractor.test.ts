import { describe, expect, test } from 'vitest';
import { PatternExtractor } from '../../services/placeExtraction';
import { createContext, getTestKnowledge } from '../helpers';

describe('PatternExtractor', () => {
  const extractor = new PatternExtractor(getTestKnowledge());

  test('extracts a three-level chain and stops before a personal name', () => {
    const sentence = '福岡県京都郡真崎村小川三四郎二十三年学生と正直に書いた';

    const candidates = extractor.extract(createContext(sentence));

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      text: '福岡県京都郡真崎村',
      span: { start: 0, end: 9 },
      sourceMethod: 'pattern',
      baseConfidence: 0.95,
      category: 'region_subregion_locality',
      sentenceText: sentence,
    });
  });

  test('extracts a region and locality', () => {
    const candidates = extractor.extract(createContext('私は千葉県船橋市に疎開した。'));

    expect(candidates.map((c) => [c.text, c.span.start, c.span.end, c.category])).toEqual([
      ['千葉県船橋市', 2, 8, 'region_locality'],
    ]);
    expect(candidates[0]?.baseConfidence).toBe(0.9);
  });

  test('extracts a city and ward without a region', () => {
    const matches = extractor.findMatches('札幌市白石区に住んでいた。');

    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({
      text: '札幌市白石区',
      start: 0,
      end: 6,
      shape: 'locality_ward',
      confidence: 0.85,
    });
    expect(matches[0]?.components).toEqual([
      { level: 'city', text: '札幌市' },
      { level: 'ward', text: '白石区' },
    ]);
  });

  test('keeps the region chain over the city and ward it contains', () => {
    const matches = extractor.findMatches('北海道札幌市白石区に住んでいた。');

    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ text: '北海道札幌市白石区', shape: 'region_locality' });
  });

  test('trims kanji that precede a known ward city', () => {
    const matches = extractor.findMatches('私は昨日横浜市中区へ行った。');

    expect(matches.map((match) => [match.text, match.start, match.end])).toEqual([
      ['横浜市中区', 4, 9],
    ]);
    expect(matches[0]?.components).toEqual([
      { level: 'city', text: '横浜市' },
      { level: 'ward', text: '中区' },
    ]);
  });

  test('keeps the earliest valid start for a city outside the ward table', () => {
    const matches = extractor.findMatches('私は木更津市中区という架空の町を書いた。');

    expect(matches.map((match) => match.text)).toEqual(['木更津市中区']);
  });

  test('rejects a locality followed by a compound continuation', () => {
    expect(extractor.findMatches('福岡県京都郡真崎村長が来た。')).toEqual([]);
  });

  test('rejects a match right after a proper-name marker', () => {
    expect(extractor.findMatches('太郎京都府宇治市に行った。')).toEqual([]);
  });

  test('returns nothing for an empty sentence', () => {
    expect(extractor.extract(createContext(''))).toEqual([]);
  });

  test('returns nothing without a region or city', () => {
    expect(extractor.findMatches('雨の日の午後、田原を思い出した。')).toEqual([]);
  });

  test('finds every occurrence of a region', () => {
    const matches = extractor.findMatches('千葉県船橋市から千葉県松戸市へ移った。');

    expect(matches.map((match) => [match.text, match.start])).toEqual([
      ['千葉県船橋市', 0],
      ['千葉県松戸市', 8],
    ]);
  });

  test('carries the surrounding text into each candidate', () => {
    const context = createContext('私は千葉県船橋市に疎開した。', {
      beforeText: '戦争が激しくなり、',
      afterText: '毎日畑を耕した。',
    });

    const [candidate] = extractor.extract(context);

    expect(candidate?.beforeText).toBe('戦争が激しくなり、');
    expect(candidate?.afterText).toBe('毎日畑を耕した。');
  });
});
