/**
 * Types for the extraction strategies.
 */

import type { Candidate, SentenceContext } from '../../types/places';

/**
 * A source of place candidates for one sentence.
 * The coordinator looks up the strategy's profile by `name`.
 */
export interface ExtractionStrategy {
  readonly name: string;
  extract(context: SentenceContext): Candidate[] | Promise<Candidate[]>;
}

export interface NerSpan {
  text: string;
  start: number;
  end: number;
}

/**
 * Black-box named-entity recognizer returning place-like strings.
 * Lower trust: its output is always re-validated by the coordinator.
 */
export interface ExternalNerSource {
  extract(documentId: string, sentenceText: string): NerSpan[] | Promise<NerSpan[]>;
}

export interface ChainComponent {
  level: 'region' | 'subRegion' | 'locality' | 'city' | 'ward';
  text: string;
}
