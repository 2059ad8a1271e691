/**
 * Context classifier module - decides whether a candidate is used as a place.
 */

export {
  buildFullContext,
  ContextClassifier,
  type ClassifierContext,
  type IndicatorScores,
} from './classifier';
export { DEGRADED_CONFIDENCE, degradedClassification } from './fallback';
