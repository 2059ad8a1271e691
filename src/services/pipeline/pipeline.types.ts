import type { GeocodedRecord, SentenceContext } from '../../types/places';
import type { RejectedCandidate } from '../coordinator';

/** A document given either as cleaned text or as prepared sentence contexts. */
export type PipelineDocument =
  | { documentId: string; text: string }
  | { documentId: string; sentences: readonly SentenceContext[] };

export interface PipelineRunOptions {
  signal?: AbortSignal;
}

export interface DocumentCounts {
  sentences: number;
  accepted: number;
  /** Candidates classified as non-place */
  rejected: number;
  /** Candidates dropped for span, source, threshold or containment reasons */
  dropped: number;
  geocoded: number;
  geocodingFailures: number;
}

export interface DocumentReport extends DocumentCounts {
  documentId: string;
  status: 'committed' | 'failed';
  error?: string;
}

export interface PipelineReport {
  documents: DocumentReport[];
  totals: DocumentCounts & { documents: number; committed: number; failed: number };
  cancelled: boolean;
}

export interface DocumentOutcome {
  records: GeocodedRecord[];
  rejected: RejectedCandidate[];
  counts: DocumentCounts;
}
