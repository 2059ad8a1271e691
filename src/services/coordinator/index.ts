export { ExtractionCoordinator, hasValidSpan } from './coordinator';
export type { CoordinationResult, RejectedCandidate, RejectionReason } from './coordinator.types';
