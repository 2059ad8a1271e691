/**
 * Place extraction module - strategies that turn a sentence into candidates.
 */

export { hasValidBoundaries, hasValidLeadingBoundary, hasValidTrailingBoundary } from './boundary';
export { compareBySpan, spanContains, suppressContained, type SpanView } from './containment';
export type {
  ChainComponent,
  ExternalNerSource,
  ExtractionStrategy,
  NerSpan,
} from './extraction.types';
export { NerExtractionStrategy } from './nerStrategy';
export { PatternExtractor, type PatternMatch } from './patternExtractor';
