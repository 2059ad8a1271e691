/**
 * Sentences module - segmentation of cleaned text into sentence contexts.
 */

export { buildSentenceContexts, DEFAULT_WINDOW_SIZE, splitIntoSentences } from './sentence.detector';
export type { Sentence, SentenceContextOptions } from './sentence.types';
