/**
 * Boundary validation for pattern matches.
 * Rejects matches that are really a slice of a longer compound or sit right
 * after a personal name.
 */

import type { BoundaryConfig } from '../knowledge';

const HIRAGANA = /[\u3040-\u309F]/;
const DIGIT = /[0-9０-９]/;

function isSoftBoundary(char: string, boundary: BoundaryConfig): boolean {
  return boundary.characters.includes(char) || HIRAGANA.test(char) || DIGIT.test(char);
}

/**
 * Check the character before the match. Adjacent kanji or katakana is only
 * allowed when the preceding window holds no proper-name marker.
 */
export function hasValidLeadingBoundary(
  sentence: string,
  start: number,
  boundary: BoundaryConfig
): boolean {
  if (start <= 0) return true;

  const previous = sentence[start - 1];
  if (isSoftBoundary(previous, boundary)) return true;

  const window = sentence.slice(Math.max(0, start - boundary.properNameWindow), start);
  return !boundary.properNameMarkers.some((marker) => window.includes(marker));
}

/**
 * Check the character after the match. A compound continuation such as
 * 長 in 村長 means the suffix belongs to a longer word.
 */
export function hasValidTrailingBoundary(
  sentence: string,
  end: number,
  boundary: BoundaryConfig
): boolean {
  if (end >= sentence.length) return true;

  const next = sentence[end];
  if (isSoftBoundary(next, boundary)) return true;

  return !boundary.compoundContinuations.includes(next);
}

export function hasValidBoundaries(
  sentence: string,
  start: number,
  end: number,
  boundary: BoundaryConfig
): boolean {
  return (
    hasValidLeadingBoundary(sentence, start, boundary) &&
    hasValidTrailingBoundary(sentence, end, boundary)
  );
}
