/**
 * Types for sentence segmentation.
 */

export interface Sentence {
  /** Document-relative start position */
  start: number;
  /** Document-relative end position */
  end: number;
  text: string;
}

export interface SentenceContextOptions {
  /** Characters of surrounding text attached on each side */
  windowSize?: number;
}
