/**
 * Pipeline module - batch processing of documents into geocoded records.
 */

export { BatchCancelledError } from './errors';
export { PlacePipeline } from './pipeline';
export type {
  DocumentCounts,
  DocumentOutcome,
  DocumentReport,
  PipelineDocument,
  PipelineReport,
  PipelineRunOptions,
} from './pipeline.types';
