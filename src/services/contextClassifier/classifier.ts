/**
 * Rule-based place/non-place classification.
 *
 * Stage A: ordered non-place context rules (direction, plant, building part,
 * generic noun). A rule fires only when its matched text contains the
 * candidate.
 * Stage B: indicator scoring with a default place bias, refined by the
 * ambiguous-name override table and the classical province table.
 */

import type { Classification, SentenceContext } from '../../types/places';
import { ClassificationError } from '../../utils/errors';
import {
  type ClassicalPlace,
  type IndicatorPattern,
  type KnowledgeBase,
  resolveIndicator,
} from '../knowledge';

export type ClassifierContext = Pick<SentenceContext, 'sentenceText' | 'beforeText' | 'afterText'>;

export interface IndicatorScores {
  place: number;
  person: number;
  historical: number;
}

export function buildFullContext(context: ClassifierContext): string {
  return [context.beforeText, context.sentenceText, context.afterText]
    .filter((part) => part.length > 0)
    .join(' ');
}

export class ContextClassifier {
  constructor(private readonly knowledge: KnowledgeBase) {}

  classify(text: string, context: ClassifierContext): Classification {
    if (!text.trim()) {
      throw new ClassificationError('Cannot classify an empty candidate');
    }

    const fullContext = buildFullContext(context);

    return (
      this.checkNonPlaceRules(text, fullContext) ?? this.classifyByIndicators(text, fullContext)
    );
  }

  scoreIndicators(text: string, fullContext: string): IndicatorScores {
    const { indicators } = this.knowledge;
    return {
      place: countMatches(indicators.place, text, fullContext),
      person: countMatches(indicators.person, text, fullContext),
      historical: countMatches(indicators.historical, text, fullContext),
    };
  }

  private checkNonPlaceRules(text: string, fullContext: string): Classification | null {
    for (const rule of this.knowledge.contextRules) {
      for (const match of fullContext.matchAll(rule.pattern)) {
        if (!match[0].includes(text)) continue;

        return {
          isPlace: false,
          confidence: rule.confidence,
          category: rule.category,
          reasoning: `Context rule matched "${match[0]}": "${text}" used as ${rule.category}`,
        };
      }
    }
    return null;
  }

  private classifyByIndicators(text: string, fullContext: string): Classification {
    const scores = this.scoreIndicators(text, fullContext);
    const { ambiguous, classical } = this.knowledge;
    const { scoring } = this.knowledge.indicators;

    const ambiguousEntry = ambiguous.places.get(text);
    if (
      ambiguousEntry &&
      scores.person >= ambiguous.personThreshold &&
      ambiguousEntry.personLikelihood > ambiguous.personLikelihoodFloor
    ) {
      return {
        isPlace: false,
        confidence: ambiguous.classificationConfidence,
        category: 'person',
        reasoning: `Ambiguous name with ${scores.person} person indicator(s); person likelihood ${ambiguousEntry.personLikelihood}`,
      };
    }

    const classicalEntry = this.lookupClassical(text);
    if (classicalEntry) {
      const keyword = classicalEntry.keywords.find((word) => fullContext.includes(word));
      const markedProvince = text.endsWith(classical.provinceMarker);
      if (keyword || scores.historical > 0 || markedProvince) {
        const evidence = keyword
          ? `keyword "${keyword}"`
          : markedProvince
            ? `province marker "${classical.provinceMarker}"`
            : `${scores.historical} historical indicator(s)`;
        return {
          isPlace: true,
          confidence: classical.classificationConfidence,
          category: 'historical_province',
          reasoning: `Classical usage (${classicalEntry.classicalUsage}) confirmed by ${evidence}`,
          suggestedModernRegion: classicalEntry.modernRegion,
        };
      }
    }

    const adjustedPlace = scores.place + scoring.defaultPlaceBias + scores.historical;
    const isPlace = adjustedPlace > scores.person || scores.person < scoring.personFloor;

    const indicatorCount = scores.place + scores.person + scores.historical;
    const confidence =
      indicatorCount > 0
        ? Math.min(
            scoring.maxConfidence,
            scoring.baseConfidence + (adjustedPlace + scores.person) * scoring.perIndicator
          )
        : scoring.noIndicatorConfidence;

    return {
      isPlace,
      confidence,
      category: isPlace ? 'place' : 'person',
      reasoning: `Indicator scoring: place ${scores.place} + bias ${scoring.defaultPlaceBias} + historical ${scores.historical} = ${adjustedPlace}, person ${scores.person}`,
    };
  }

  private lookupClassical(text: string): ClassicalPlace | undefined {
    const { places, provinceMarker } = this.knowledge.classical;
    const direct = places.get(text);
    if (direct) return direct;
    if (text.endsWith(provinceMarker) && text.length > provinceMarker.length) {
      return places.get(text.slice(0, -provinceMarker.length));
    }
    return undefined;
  }
}

function countMatches(patterns: readonly IndicatorPattern[], text: string, fullContext: string): number {
  return patterns.filter((indicator) => resolveIndicator(indicator, text).test(fullContext)).length;
}
