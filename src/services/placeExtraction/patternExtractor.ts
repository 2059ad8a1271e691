/**
 * Hierarchical compound place-name extraction.
 *
 * Chains a top-level region with an immediately adjacent sub-region and
 * locality (福岡県京都郡真崎村), a region with a locality (千葉県船橋市), or a
 * city with a ward (札幌市白石区). Every match is boundary-checked and
 * contained matches are suppressed.
 */

import type {
  Candidate,
  ChainShape,
  SentenceContext,
} from '../../types/places';
import { escapeRegex, type KnowledgeBase, type LevelSpec } from '../knowledge';
import { hasValidBoundaries, hasValidLeadingBoundary } from './boundary';
import { suppressContained } from './containment';
import type { ChainComponent, ExtractionStrategy } from './extraction.types';

export interface PatternMatch {
  text: string;
  start: number;
  end: number;
  shape: ChainShape;
  confidence: number;
  components: ChainComponent[];
}

interface LevelPatterns {
  subRegion: RegExp;
  localityAfterSubRegion: RegExp;
  localityAfterRegion: RegExp;
  city: RegExp;
  cityExact: RegExp;
  ward: RegExp;
}

function levelSource(kanjiClass: string, level: LevelSpec): string {
  const suffixes = level.suffixes.map(escapeRegex).join('|');
  return `[${kanjiClass}]{${level.minLength},${level.maxLength}}(?:${suffixes})`;
}

export class PatternExtractor implements ExtractionStrategy {
  readonly name = 'pattern';

  private readonly patterns: LevelPatterns;

  constructor(private readonly knowledge: KnowledgeBase) {
    const { kanjiClass, levels } = knowledge.hierarchy;
    const anchored = (level: LevelSpec) => new RegExp(`^${levelSource(kanjiClass, level)}`);

    this.patterns = {
      subRegion: anchored(levels.subRegion),
      localityAfterSubRegion: anchored(levels.localityAfterSubRegion),
      localityAfterRegion: anchored(levels.localityAfterRegion),
      city: new RegExp(levelSource(kanjiClass, levels.city), 'g'),
      cityExact: new RegExp(`^${levelSource(kanjiClass, levels.city)}$`),
      ward: anchored(levels.ward),
    };
  }

  extract(context: SentenceContext): Candidate[] {
    return this.findMatches(context.sentenceText).map((match) => ({
      text: match.text,
      span: { start: match.start, end: match.end },
      sourceMethod: this.name,
      baseConfidence: match.confidence,
      sentenceText: context.sentenceText,
      beforeText: context.beforeText,
      afterText: context.afterText,
      category: match.shape,
    }));
  }

  /**
   * All boundary-valid matches in a sentence after containment suppression,
   * ordered by position.
   */
  findMatches(sentence: string): PatternMatch[] {
    if (!sentence) return [];

    const matches = [...this.findRegionChains(sentence), ...this.findCityWards(sentence)];

    return suppressContained(matches, (match) => ({
      text: match.text,
      span: { start: match.start, end: match.end },
      confidence: match.confidence,
    }));
  }

  private findRegionChains(sentence: string): PatternMatch[] {
    const matches: PatternMatch[] = [];

    for (const region of this.knowledge.regions) {
      let position = sentence.indexOf(region);
      while (position !== -1) {
        const match = this.extendRegion(sentence, region, position);
        if (match) {
          matches.push(match);
        }
        position = sentence.indexOf(region, position + region.length);
      }
    }

    return matches;
  }

  /**
   * Try the deepest chain first; the first one that passes boundary
   * validation wins for this start position.
   */
  private extendRegion(sentence: string, region: string, start: number): PatternMatch | null {
    const regionEnd = start + region.length;
    const rest = sentence.slice(regionEnd);
    const attempts: Array<{ shape: ChainShape; components: ChainComponent[] }> = [];

    const subRegion = this.patterns.subRegion.exec(rest);
    if (subRegion) {
      const locality = this.patterns.localityAfterSubRegion.exec(rest.slice(subRegion[0].length));
      if (locality) {
        attempts.push({
          shape: 'region_subregion_locality',
          components: [
            { level: 'region', text: region },
            { level: 'subRegion', text: subRegion[0] },
            { level: 'locality', text: locality[0] },
          ],
        });
      }
    }

    const locality = this.patterns.localityAfterRegion.exec(rest);
    if (locality) {
      attempts.push({
        shape: 'region_locality',
        components: [
          { level: 'region', text: region },
          { level: 'locality', text: locality[0] },
        ],
      });
    }

    for (const attempt of attempts) {
      const match = this.buildMatch(sentence, start, attempt.shape, attempt.components);
      if (match) return match;
    }
    return null;
  }

  private findCityWards(sentence: string): PatternMatch[] {
    const matches: PatternMatch[] = [];

    for (const city of sentence.matchAll(this.patterns.city)) {
      const runStart = city.index ?? 0;
      const cityEnd = runStart + city[0].length;
      const ward = this.patterns.ward.exec(sentence.slice(cityEnd));
      if (!ward) continue;

      const start = this.cityStart(sentence, runStart, cityEnd);
      if (start === null) continue;

      const match = this.buildMatch(sentence, start, 'locality_ward', [
        { level: 'city', text: sentence.slice(start, cityEnd) },
        { level: 'ward', text: ward[0] },
      ]);
      if (match) {
        matches.push(match);
      }
    }

    return matches;
  }

  /**
   * The greedy city match swallows whatever kanji precede the name
   * (昨日横浜市). A known ward city inside the run wins; otherwise the
   * earliest boundary-valid start is kept.
   */
  private cityStart(sentence: string, runStart: number, cityEnd: number): number | null {
    const { boundary, wardCities } = this.knowledge.hierarchy;
    const starts: number[] = [];

    for (let start = runStart; start < cityEnd; start++) {
      if (!this.patterns.cityExact.test(sentence.slice(start, cityEnd))) continue;
      if (!hasValidLeadingBoundary(sentence, start, boundary)) continue;
      starts.push(start);
    }

    const known = starts.find((start) => wardCities.includes(sentence.slice(start, cityEnd)));
    return known ?? starts[0] ?? null;
  }

  private buildMatch(
    sentence: string,
    start: number,
    shape: ChainShape,
    components: ChainComponent[]
  ): PatternMatch | null {
    const text = components.map((component) => component.text).join('');
    const end = start + text.length;

    if (!hasValidBoundaries(sentence, start, end, this.knowledge.hierarchy.boundary)) {
      return null;
    }

    return {
      text,
      start,
      end,
      shape,
      confidence: this.knowledge.hierarchy.confidence[shape],
      components,
    };
  }
}
