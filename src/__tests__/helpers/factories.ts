import {
  DEFAULT_KNOWLEDGE_DIR,
  type KnowledgeBase,
  parseKnowledgeBase,
  readKnowledgeTables,
} from '../../services/knowledge';
import type {
  AcceptedMention,
  Candidate,
  CandidateCategory,
  SentenceContext,
} from '../../types/places';

let knowledge: KnowledgeBase | null = null;

/** The shipped knowledge tables, parsed once per test file. */
export function getTestKnowledge(): KnowledgeBase {
  if (!knowledge) {
    knowledge = parseKnowledgeBase(readKnowledgeTables(DEFAULT_KNOWLEDGE_DIR));
  }
  return knowledge;
}

export function createContext(
  sentenceText: string,
  overrides: Partial<SentenceContext> = {}
): SentenceContext {
  return {
    documentId: 'doc-1',
    sentenceText,
    beforeText: '',
    afterText: '',
    ...overrides,
  };
}

/**
 * Candidate for `text` at its first occurrence in the sentence, unless a
 * start is given.
 */
export function createCandidate(
  sentenceText: string,
  text: string,
  overrides: {
    start?: number;
    sourceMethod?: string;
    baseConfidence?: number;
    category?: CandidateCategory;
  } = {}
): Candidate {
  const start = overrides.start ?? sentenceText.indexOf(text);
  return {
    text,
    span: { start, end: start + text.length },
    sourceMethod: overrides.sourceMethod ?? 'ner',
    baseConfidence: overrides.baseConfidence ?? 0.6,
    sentenceText,
    beforeText: '',
    afterText: '',
    category: overrides.category ?? 'ner_candidate',
  };
}

export function createMention(overrides: Partial<AcceptedMention> = {}): AcceptedMention {
  const placeName = overrides.placeName ?? '千葉県船橋市';
  const sentenceText = overrides.sentenceText ?? `私は${placeName}に疎開した。`;
  const start = sentenceText.indexOf(placeName);
  return {
    documentId: 'doc-1',
    placeName,
    span: { start, end: start + placeName.length },
    confidence: 0.9,
    sourceMethod: 'pattern',
    classificationLabel: 'place',
    reasoning: 'test mention',
    sentenceText,
    contextBefore: '',
    contextAfter: '',
    ...overrides,
  };
}
