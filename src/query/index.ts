export {
  MatchEngine,
  type MatchEngineOptions,
  type SearchOptions,
  type SourceFilter,
} from './match-engine.js'
export { UnknownSourceError, ConflictingSourceFilterError } from './query-error.js'
