import type { AcceptedMention, Candidate, Classification } from '../../types/places';

export type RejectionReason =
  | 'invalid_span'
  | 'unknown_source'
  | 'non_place'
  | 'below_threshold'
  | 'contained';

export interface RejectedCandidate {
  candidate: Candidate;
  reason: RejectionReason;
  /** Confidence after any classification adjustment */
  confidence: number;
  detail: string;
  classification?: Classification;
}

export interface CoordinationResult {
  mentions: AcceptedMention[];
  rejected: RejectedCandidate[];
}
