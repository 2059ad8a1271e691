/**
 * Runs every extraction strategy over a sentence and reconciles their output
 * into one ordered list of accepted place mentions.
 *
 * reconcile() never mutates its input and depends only on the candidates and
 * the knowledge base, so the same candidate list always yields the same result.
 */

import type {
  AcceptedMention,
  Candidate,
  Classification,
  SentenceContext,
} from '../../types/places';
import { ExtractionError, toErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { type ContextClassifier, degradedClassification } from '../contextClassifier';
import type { KnowledgeBase, SourceProfile } from '../knowledge';
import {
  compareBySpan,
  type ExtractionStrategy,
  suppressContained,
} from '../placeExtraction';
import type { CoordinationResult, RejectedCandidate } from './coordinator.types';

interface CandidateGroup {
  representative: Candidate;
  profile: SourceProfile;
  alsoReportedBy: string[];
}

interface Judgement {
  classification: Classification | null;
  degraded: boolean;
}

export function hasValidSpan(candidate: Candidate): boolean {
  const { span, sentenceText, text } = candidate;
  return (
    Number.isInteger(span.start) &&
    Number.isInteger(span.end) &&
    span.start >= 0 &&
    span.start < span.end &&
    span.end <= sentenceText.length &&
    text.length > 0 &&
    sentenceText.slice(span.start, span.end) === text &&
    Number.isFinite(candidate.baseConfidence) &&
    candidate.baseConfidence >= 0 &&
    candidate.baseConfidence <= 1
  );
}

function compareRepresentatives(
  a: { candidate: Candidate; profile: SourceProfile },
  b: { candidate: Candidate; profile: SourceProfile }
): number {
  if (a.profile.priority !== b.profile.priority) return a.profile.priority - b.profile.priority;
  if (a.candidate.baseConfidence !== b.candidate.baseConfidence) {
    return b.candidate.baseConfidence - a.candidate.baseConfidence;
  }
  if (a.candidate.text.length !== b.candidate.text.length) {
    return b.candidate.text.length - a.candidate.text.length;
  }
  return a.candidate.sourceMethod < b.candidate.sourceMethod
    ? -1
    : a.candidate.sourceMethod > b.candidate.sourceMethod
      ? 1
      : 0;
}

export class ExtractionCoordinator {
  private readonly trustedSource: string;

  constructor(
    private readonly strategies: readonly ExtractionStrategy[],
    private readonly classifier: ContextClassifier,
    private readonly knowledge: KnowledgeBase
  ) {
    let trusted: SourceProfile | null = null;
    for (const profile of knowledge.extractors.profiles.values()) {
      if (!trusted || profile.priority < trusted.priority) {
        trusted = profile;
      }
    }
    this.trustedSource = trusted ? trusted.name : '';
  }

  async coordinate(context: SentenceContext): Promise<CoordinationResult> {
    const results = await Promise.all(
      this.strategies.map((strategy) => this.runStrategy(strategy, context))
    );
    return this.reconcile(context, results.flat());
  }

  reconcile(context: SentenceContext, candidates: readonly Candidate[]): CoordinationResult {
    const rejected: RejectedCandidate[] = [];
    const groups = this.group(candidates, rejected);

    const accepted: AcceptedMention[] = [];
    for (const group of groups) {
      const mention = this.judge(context, group, rejected);
      if (mention) accepted.push(mention);
    }

    const kept = suppressContained(accepted, (mention) => ({
      text: mention.placeName,
      span: mention.span,
      confidence: mention.confidence,
    }));
    const keptSet = new Set(kept);

    for (const group of groups) {
      const mention = accepted.find(
        (m) =>
          m.placeName === group.representative.text &&
          m.span.start === group.representative.span.start
      );
      if (mention && !keptSet.has(mention)) {
        rejected.push({
          candidate: group.representative,
          reason: 'contained',
          confidence: mention.confidence,
          detail: 'Contained in a longer accepted mention',
        });
      }
    }

    return {
      mentions: kept,
      rejected: rejected.sort((a, b) =>
        compareBySpan(
          { text: a.candidate.text, span: a.candidate.span, confidence: a.confidence },
          { text: b.candidate.text, span: b.candidate.span, confidence: b.confidence }
        )
      ),
    };
  }

  private async runStrategy(
    strategy: ExtractionStrategy,
    context: SentenceContext
  ): Promise<Candidate[]> {
    try {
      return await strategy.extract(context);
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError(strategy.name, toErrorMessage(error), error);
      logger.warn(
        { strategy: strategy.name, documentId: context.documentId, error: failure.message },
        'Extraction strategy failed, continuing without its candidates'
      );
      return [];
    }
  }

  private group(candidates: readonly Candidate[], rejected: RejectedCandidate[]): CandidateGroup[] {
    const buckets = new Map<string, { candidate: Candidate; profile: SourceProfile }[]>();

    for (const candidate of candidates) {
      if (!hasValidSpan(candidate)) {
        rejected.push({
          candidate,
          reason: 'invalid_span',
          confidence: candidate.baseConfidence,
          detail: `Span ${candidate.span.start}-${candidate.span.end} does not match "${candidate.text}"`,
        });
        continue;
      }
      const profile = this.knowledge.extractors.profiles.get(candidate.sourceMethod);
      if (!profile) {
        rejected.push({
          candidate,
          reason: 'unknown_source',
          confidence: candidate.baseConfidence,
          detail: `No source profile for "${candidate.sourceMethod}"`,
        });
        continue;
      }
      const key = `${candidate.span.start}\u0000${candidate.text}`;
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push({ candidate, profile });
      } else {
        buckets.set(key, [{ candidate, profile }]);
      }
    }

    const groups: CandidateGroup[] = [];
    for (const bucket of buckets.values()) {
      const [best, ...others] = [...bucket].sort(compareRepresentatives);
      if (!best) continue;
      groups.push({
        representative: best.candidate,
        profile: best.profile,
        alsoReportedBy: [
          ...new Set(
            others
              .map((entry) => entry.candidate.sourceMethod)
              .filter((source) => source !== best.candidate.sourceMethod)
          ),
        ],
      });
    }

    return groups.sort((a, b) =>
      compareBySpan(
        {
          text: a.representative.text,
          span: a.representative.span,
          confidence: a.representative.baseConfidence,
        },
        {
          text: b.representative.text,
          span: b.representative.span,
          confidence: b.representative.baseConfidence,
        }
      )
    );
  }

  private classify(candidate: Candidate, profile: SourceProfile): Judgement {
    const { classifyTrustedSources } = this.knowledge.extractors.classification;
    if (profile.name === this.trustedSource && !classifyTrustedSources) {
      return { classification: null, degraded: false };
    }

    try {
      return { classification: this.classifier.classify(candidate.text, candidate), degraded: false };
    } catch (error) {
      logger.warn(
        { text: candidate.text, source: candidate.sourceMethod, error: toErrorMessage(error) },
        'Classifier failed, using fallback rule'
      );
      return {
        classification: degradedClassification(candidate.text, this.knowledge.extractors.fallback),
        degraded: true,
      };
    }
  }

  private judge(
    context: SentenceContext,
    group: CandidateGroup,
    rejected: RejectedCandidate[]
  ): AcceptedMention | null {
    const { representative: candidate, profile } = group;
    const { placeMultiplier, nonPlaceMultiplier } = this.knowledge.extractors.classification;
    const { classification, degraded } = this.classify(candidate, profile);

    if (classification && !classification.isPlace) {
      rejected.push({
        candidate,
        reason: 'non_place',
        confidence: candidate.baseConfidence * nonPlaceMultiplier,
        detail: classification.reasoning,
        classification,
      });
      return null;
    }

    let confidence = candidate.baseConfidence;
    if (classification) {
      confidence = degraded
        ? candidate.baseConfidence * this.knowledge.extractors.fallback.confidenceMultiplier
        : Math.min(1, candidate.baseConfidence * placeMultiplier);
    }

    if (confidence < profile.trustThreshold) {
      rejected.push({
        candidate,
        reason: 'below_threshold',
        confidence,
        detail: `Confidence ${confidence.toFixed(3)} below ${profile.name} threshold ${profile.trustThreshold}`,
        ...(classification ? { classification } : {}),
      });
      return null;
    }

    const reasons = [
      classification ? classification.reasoning : `Trusted ${profile.name} match (${candidate.category})`,
    ];
    if (group.alsoReportedBy.length > 0) {
      reasons.push(`also reported by ${group.alsoReportedBy.join(', ')}`);
    }

    const mention: AcceptedMention = {
      documentId: context.documentId,
      placeName: candidate.text,
      span: { start: candidate.span.start, end: candidate.span.end },
      confidence,
      sourceMethod: candidate.sourceMethod,
      classificationLabel: classification ? classification.category : 'place',
      reasoning: reasons.join('; '),
      sentenceText: candidate.sentenceText,
      contextBefore: candidate.beforeText,
      contextAfter: candidate.afterText,
    };
    if (classification?.suggestedModernRegion) {
      mention.suggestedModernRegion = classification.suggestedModernRegion;
    }
    return mention;
  }
}
