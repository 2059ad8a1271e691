/**
 * Sentence detection for Japanese prose.
 * Splits after 。！？ (keeping closing brackets with their sentence) and at
 * line breaks.
 */

import type { SentenceContext } from '../../types/places';
import type { Sentence, SentenceContextOptions } from './sentence.types';

const SENTENCE_END = /[。！？!?]+[」』）)]*|\n+/g;

export const DEFAULT_WINDOW_SIZE = 50;

function pushTrimmed(sentences: Sentence[], text: string, start: number, end: number): void {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(text.charAt(s))) s++;
  while (e > s && /\s/.test(text.charAt(e - 1))) e--;
  if (e > s) {
    sentences.push({ start: s, end: e, text: text.slice(s, e) });
  }
}

/**
 * Split text into sentences.
 * Returns sentence boundaries relative to the input text.
 */
export function splitIntoSentences(text: string): Sentence[] {
  const sentences: Sentence[] = [];

  if (!text.trim()) {
    return sentences;
  }

  let lastEnd = 0;
  for (const match of text.matchAll(SENTENCE_END)) {
    const index = match.index ?? 0;
    const terminatorEnd = match[0].startsWith('\n') ? index : index + match[0].length;
    pushTrimmed(sentences, text, lastEnd, terminatorEnd);
    lastEnd = index + match[0].length;
  }

  // Trailing text without terminal punctuation
  pushTrimmed(sentences, text, lastEnd, text.length);

  return sentences;
}

export function buildSentenceContexts(
  documentId: string,
  text: string,
  options: SentenceContextOptions = {}
): SentenceContext[] {
  const windowSize = Math.max(0, options.windowSize ?? DEFAULT_WINDOW_SIZE);

  return splitIntoSentences(text).map((sentence) => ({
    documentId,
    sentenceText: sentence.text,
    beforeText: text.slice(Math.max(0, sentence.start - windowSize), sentence.start),
    afterText: text.slice(sentence.end, sentence.end + windowSize),
  }));
}
