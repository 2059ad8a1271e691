/**
 * Containment-based suppression shared by the pattern extractor and the
 * coordinator.
 */

import type { Span } from '../../types/places';

export interface SpanView {
  text: string;
  span: Span;
  confidence: number;
}

export function spanContains(outer: Span, inner: Span): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

function sameSpan(a: Span, b: Span): boolean {
  return a.start === b.start && a.end === b.end;
}

/**
 * Drop every item whose span is wholly inside a longer kept item's span and
 * whose text is a substring of that item's text. Identical spans keep the
 * higher-confidence item. Contained items with unrelated text are kept.
 *
 * Output order: span start, then longer span first, then text.
 */
export function suppressContained<T>(items: readonly T[], view: (item: T) => SpanView): T[] {
  const ranked = [...items].sort((a, b) => {
    const va = view(a);
    const vb = view(b);
    const lengthDelta = vb.span.end - vb.span.start - (va.span.end - va.span.start);
    if (lengthDelta !== 0) return lengthDelta;
    if (vb.confidence !== va.confidence) return vb.confidence - va.confidence;
    if (va.span.start !== vb.span.start) return va.span.start - vb.span.start;
    return va.text < vb.text ? -1 : va.text > vb.text ? 1 : 0;
  });

  const kept: T[] = [];
  for (const item of ranked) {
    const candidate = view(item);
    const suppressed = kept.some((existing) => {
      const keeper = view(existing);
      if (!spanContains(keeper.span, candidate.span)) return false;
      return sameSpan(keeper.span, candidate.span) || keeper.text.includes(candidate.text);
    });
    if (!suppressed) {
      kept.push(item);
    }
  }

  return kept.sort((a, b) => compareBySpan(view(a), view(b)));
}

export function compareBySpan(a: SpanView, b: SpanView): number {
  if (a.span.start !== b.span.start) return a.span.start - b.span.start;
  if (a.span.end !== b.span.end) return b.span.end - a.span.end;
  return a.text < b.text ? -1 : a.text > b.text ? 1 : 0;
}
