/**
 * Knowledge module - versioned domain tables shared read-only by every component.
 */

export {
  DEFAULT_KNOWLEDGE_DIR,
  describeKnowledgeBase,
  escapeRegex,
  loadKnowledgeBase,
  parseKnowledgeBase,
  readKnowledgeTables,
  resolveIndicator,
} from './knowledge.loader';
export { KNOWLEDGE_FILES } from './knowledge.types';
export type {
  AmbiguousPlace,
  AmbiguousTable,
  BoundaryConfig,
  ClassicalPlace,
  ClassicalTable,
  ContextRule,
  ContextRuleCategory,
  ExtractorSettings,
  FallbackCategory,
  Gazetteer,
  GazetteerEntry,
  HierarchyConfig,
  HierarchyLevels,
  IndicatorCatalogue,
  IndicatorPattern,
  IndicatorScoring,
  KnowledgeBase,
  KnowledgeTableName,
  LevelSpec,
  RawKnowledgeTables,
  SourceProfile,
} from './knowledge.types';
