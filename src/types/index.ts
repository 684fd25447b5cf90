export type {
  DiseaseFlag,
  SourceRecord,
  MergeGroup,
  MergedRecord,
  MergeCommit,
} from './record.js'

export {
  SourceName,
  SOURCE_NAMES,
  SOURCE_PRIORITY,
  SOURCE_PREFIXES,
  EXTERNAL_PREFIXES,
  isSourceName,
  parseSourceName,
  splitConceptId,
  sourceForConceptId,
  sourceRank,
  compareSourcePriority,
} from './source.js'
export type { SourceMeta } from './source.js'

export {
  MatchType,
  LOOKUP_FIELDS,
  MATCH_TIERS,
} from './match.js'
export type {
  LookupField,
  QueryWarning,
  SourceMatch,
  SourceMatches,
  SearchResult,
  NormalizationResult,
} from './match.js'
