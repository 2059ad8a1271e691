/**
 * Adapts an external named-entity recognizer to the extraction strategy
 * interface. Spans the recognizer reports are trusted as given; the
 * coordinator drops any that do not line up with the sentence.
 */

import type { Candidate, SentenceContext } from '../../types/places';
import type { SourceProfile } from '../knowledge';
import type { ExternalNerSource, ExtractionStrategy } from './extraction.types';

export class NerExtractionStrategy implements ExtractionStrategy {
  readonly name: string;

  constructor(
    private readonly source: ExternalNerSource,
    private readonly profile: SourceProfile
  ) {
    this.name = profile.name;
  }

  async extract(context: SentenceContext): Promise<Candidate[]> {
    const spans = await this.source.extract(context.documentId, context.sentenceText);

    return spans.map((span) => ({
      text: span.text,
      span: { start: span.start, end: span.end },
      sourceMethod: this.name,
      baseConfidence: this.profile.baseReliability,
      sentenceText: context.sentenceText,
      beforeText: context.beforeText,
      afterText: context.afterText,
      category: 'ner_candidate',
    }));
  }
}
