// Main entry point
export { DiseaseNorm, NormalizerBuilder } from './builder/normalizer-builder.js'
export { DiseaseNormalizer, type IngestResult } from './core/disease-normalizer.js'

// Types - Records and sources
export type {
  DiseaseFlag,
  SourceRecord,
  MergeGroup,
  MergedRecord,
  MergeCommit,
  SourceMeta,
  LookupField,
  QueryWarning,
  SourceMatch,
  SourceMatches,
  SearchResult,
  NormalizationResult,
} from './types/index.js'
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
  MatchType,
  LOOKUP_FIELDS,
  MATCH_TIERS,
} from './types/index.js'

// Grouping
export {
  SourceSnapshot,
  DisjointSet,
  XrefGraphBuilder,
  selectMergeRef,
  type XrefGraphBuilderOptions,
} from './graph/index.js'

// Merging
export {
  RecordMerger,
  MergeRebuilder,
  MergeError,
  MergeValidationError,
  RebuildFailure,
  summarizeIssues,
  preferNonEmpty,
  unionCaseInsensitive,
  anyTrue,
  type DataIntegrityKind,
  type DataIntegrityIssue,
  type IntegritySummary,
  type GroupingResult,
  type RebuildResult,
  type RebuildStage,
  type MergeRebuilderOptions,
} from './merge/index.js'

// Matching
export {
  MatchEngine,
  UnknownSourceError,
  ConflictingSourceFilterError,
  type MatchEngineOptions,
  type SearchOptions,
  type SourceFilter,
} from './query/index.js'

// Storage (the PostgreSQL store lives under the ./adapters/drizzle entry)
export {
  MemoryDiseaseStore,
  BaseDiseaseStore,
  AdapterError,
  ConnectionError,
  QueryError,
  TransactionError,
  ValidationError,
  type DiseaseStore,
  type StoreOptions,
} from './adapters/index.js'

// Ingestion
export {
  SourceLoader,
  SourceTransformer,
  NcitTransformer,
  MondoTransformer,
  OmimTransformer,
  OncoTreeTransformer,
  DoTransformer,
  transformerFor,
  canonicalPrefix,
  MAX_ALIASES,
  ExtractedTermSchema,
  SourceFileSchema,
  EtlError,
  SourceFileError,
  TransformError,
  type ExtractedTerm,
  type SourceFile,
  type LoadedSource,
  type SourceLoaderOptions,
  type ReferenceRoute,
  type TransformerOptions,
} from './etl/index.js'

// Configuration
export {
  NormalizerConfigSchema,
  ConfigValidationError,
  loadConfig,
  isLogLevel,
  type NormalizerConfig,
} from './config/index.js'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  createLeveledLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './utils/logger.js'

// Errors
export {
  DiseaseNormalizerError,
  InvalidParameterError,
  ConfigurationError,
  NotConfiguredError,
  requireNonNull,
  requireNonEmptyString,
  requireOneOf,
  errorMessage,
} from './utils/errors.js'

// Strings
export {
  foldCase,
  compareCanonical,
  sortCanonical,
  CaseInsensitiveSet,
} from './utils/strings.js'
