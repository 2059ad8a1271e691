export {
  computeSentenceHash,
  DrizzleResultSink,
  type MentionDatabase,
  type MentionTransaction,
  toRow,
} from './drizzle.sink';
export { InMemoryResultSink } from './memory.sink';
export type { ResultSink } from './sink.interface';
