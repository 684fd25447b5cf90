/**
 * Facade over storage, merge rebuild and matching
 * @module core/disease-normalizer
 */

import type { DiseaseStore } from '../adapters/types.js'
import { MergeRebuilder } from '../merge/merge-rebuilder.js'
import { RecordMerger } from '../merge/record-merger.js'
import type { RebuildResult } from '../merge/types.js'
import { MatchEngine, type SearchOptions } from '../query/match-engine.js'
import type {
  NormalizationResult,
  SearchResult,
  SourceMatch,
} from '../types/match.js'
import type { SourceRecord } from '../types/record.js'
import { parseSourceName, type SourceMeta, type SourceName } from '../types/source.js'
import { InvalidParameterError, requireNonEmptyString } from '../utils/errors.js'
import { createPrefixedLogger, type Logger } from '../utils/logger.js'

/**
 * Outcome of replacing one source's records
 */
export interface IngestResult {
  sourceName: SourceName
  removed: number
  added: number
}

/**
 * DiseaseNormalizer - public entry point for ingestion, rebuild and queries
 *
 * Created through {@link NormalizerBuilder}. Queries see the merged set of
 * the last committed rebuild; records ingested since then match as
 * singletons until the next `rebuildMerges()`.
 *
 * @example
 * ```typescript
 * const normalizer = DiseaseNorm.create().storage(store).build()
 * await normalizer.ingest('NCIt', ncitRecords)
 * await normalizer.rebuildMerges()
 * const result = await normalizer.normalize('nsclc')
 * ```
 */
export class DiseaseNormalizer {
  private readonly rebuilder: MergeRebuilder
  private readonly engine: MatchEngine

  constructor(
    private readonly store: DiseaseStore,
    private readonly logger: Logger
  ) {
    const merger = new RecordMerger()
    this.rebuilder = new MergeRebuilder(store, {
      merger,
      logger: createPrefixedLogger('rebuild', logger),
    })
    this.engine = new MatchEngine(store, {
      merger,
      logger: createPrefixedLogger('query', logger),
    })
  }

  /**
   * Regroups every stored record and atomically replaces the merged set
   *
   * @throws {RebuildFailure} If storage fails while loading or committing
   */
  rebuildMerges(): Promise<RebuildResult> {
    return this.rebuilder.rebuild()
  }

  search(query: string, options?: SearchOptions): Promise<SearchResult> {
    return this.engine.search(query, options)
  }

  searchSource(sourceName: string, query: string): Promise<SourceMatch[]> {
    return this.engine.searchSource(sourceName, query)
  }

  normalize(query: string): Promise<NormalizationResult> {
    return this.engine.normalize(query)
  }

  /**
   * Replaces all records of one source, and its metadata when given.
   * Merged records are not touched until the next rebuild.
   *
   * The new records are validated before the old ones are removed; a
   * rejected batch leaves the stored source as it was.
   *
   * @throws {InvalidParameterError} If the source is unknown or a record
   * belongs to another source
   * @throws {ValidationError} If a record is malformed or its concept id
   * lacks the source's prefix
   */
  async ingest(
    source: string,
    records: SourceRecord[],
    meta?: SourceMeta
  ): Promise<IngestResult> {
    const sourceName = parseSourceName(requireNonEmptyString(source, 'source'))
    if (!sourceName) {
      throw new InvalidParameterError('source', source, 'unknown source')
    }
    const foreign = records.find((record) => record.sourceName !== sourceName)
    if (foreign) {
      throw new InvalidParameterError(
        'records',
        foreign.conceptId,
        `record belongs to ${foreign.sourceName}, not ${sourceName}`
      )
    }

    const removed = await this.store.replaceSource(sourceName, records)
    if (meta) {
      await this.store.addSourceMetadata(sourceName, meta)
    }

    this.logger.info(`Ingested ${sourceName}`, {
      removed,
      added: records.length,
    })
    return { sourceName, removed, added: records.length }
  }
}
