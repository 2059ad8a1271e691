/**
 * Degraded classification used when the classifier throws.
 * One-character tokens and deny-listed words are non-place; everything else
 * stays a place at reduced confidence.
 */

import type { Classification } from '../../types/places';
import type { ExtractorSettings } from '../knowledge';

export const DEGRADED_CONFIDENCE = 0.5;

export function degradedClassification(
  text: string,
  fallback: ExtractorSettings['fallback']
): Classification {
  const denied = fallback.denyList.get(text);
  if (denied) {
    return {
      isPlace: false,
      confidence: DEGRADED_CONFIDENCE,
      category: denied,
      reasoning: `Fallback: "${text}" is a deny-listed ${denied} word`,
    };
  }

  if ([...text].length <= 1) {
    return {
      isPlace: false,
      confidence: DEGRADED_CONFIDENCE,
      category: 'unknown',
      reasoning: `Fallback: one-character token "${text}" is not trusted as a place`,
    };
  }

  return {
    isPlace: true,
    confidence: DEGRADED_CONFIDENCE,
    category: 'place',
    reasoning: 'Fallback: kept as place at reduced confidence',
  };
}
