/**
 * Exact, case-insensitive matching of queries against the stored terms
 * @module query/match-engine
 */

import type { DiseaseStore } from '../adapters/types.js'
import { RecordMerger } from '../merge/record-merger.js'
import {
  MATCH_TIERS,
  MatchType,
  type NormalizationResult,
  type QueryWarning,
  type SearchResult,
  type SourceMatch,
  type SourceMatches,
} from '../types/match.js'
import type { MergedRecord, SourceRecord } from '../types/record.js'
import {
  SOURCE_NAMES,
  compareSourcePriority,
  parseSourceName,
  sourceForConceptId,
  type SourceMeta,
  type SourceName,
} from '../types/source.js'
import { InvalidParameterError } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { foldCase } from '../utils/strings.js'
import { ConflictingSourceFilterError, UnknownSourceError } from './query-error.js'

const NBSP_PATTERN = /\u00a0|&nbsp;/i

/** Reads of a merge ref before a missing merged record is reported */
const MERGE_READ_ATTEMPTS = 3

/**
 * Source filter accepted by {@link MatchEngine.search}: a comma-separated
 * string or a list of source names, in any casing
 */
export type SourceFilter = string | readonly string[]

export interface SearchOptions {
  include?: SourceFilter
  exclude?: SourceFilter
}

export interface MatchEngineOptions {
  logger?: Logger
  merger?: RecordMerger
}

interface TierHit {
  matchType: MatchType
  records: SourceRecord[]
}

const NO_HIT: TierHit = { matchType: MatchType.NO_MATCH, records: [] }

/**
 * MatchEngine - answers search, searchSource and normalize queries
 *
 * Tiers are tried in precedence order (concept id, label, alias, xref,
 * associated_with) and evaluation stops at the first tier with a hit.
 * The query is only case-folded; no trimming or fuzzy matching.
 *
 * @example
 * ```typescript
 * const engine = new MatchEngine(store, { logger })
 * const result = await engine.normalize('NSCLC')
 * result.matchType // 'ALIAS'
 * result.record?.conceptId // 'ncit:C2926'
 * ```
 */
export class MatchEngine {
  private readonly logger: Logger
  private readonly merger: RecordMerger

  constructor(
    private readonly store: DiseaseStore,
    options: MatchEngineOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
    this.merger = options.merger ?? new RecordMerger()
  }

  /**
   * Records of one source at that source's best matching tier, ordered by
   * concept id
   *
   * @throws {UnknownSourceError} If `sourceName` is not an ingested source
   */
  async searchSource(sourceName: string, query: string): Promise<SourceMatch[]> {
    const source = parseSourceName(sourceName)
    if (!source) {
      throw new UnknownSourceError('sourceName', sourceName)
    }
    this.checkQuery(query)

    const hits = await this.bestTierPerSource(query, [source])
    const hit = hits.get(source) ?? NO_HIT
    return hit.records.map((record) => ({ record, matchType: hit.matchType }))
  }

  /**
   * Best matches per source. Sources without a hit are reported with
   * `NO_MATCH` and no records.
   *
   * @throws {InvalidParameterError} If a filter names an unknown source or
   * both filters are given
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult> {
    this.checkQuery(query)
    const sources = this.resolveSources(options)
    const warnings = this.queryWarnings(query)

    const hits = await this.bestTierPerSource(query, sources)
    const sourceMatches: Partial<Record<SourceName, SourceMatches>> = {}
    for (const source of sources) {
      const hit = hits.get(source) ?? NO_HIT
      sourceMatches[source] = {
        matchType: hit.matchType,
        records: hit.records,
        sourceMeta: await this.store.getSourceMetadata(source),
      }
    }

    return { query, warnings, sourceMatches }
  }

  /**
   * Resolves a query to one merged concept
   */
  async normalize(query: string): Promise<NormalizationResult> {
    this.checkQuery(query)
    const warnings = this.queryWarnings(query)

    const hit = await this.bestTier(query)
    const [chosen] = hit.records
    if (!chosen) {
      return { query, matchType: MatchType.NO_MATCH, record: null, sourceMeta: {}, warnings }
    }

    const candidates = this.distinctMergeRefs(hit.records)
    if (candidates.length > 1) {
      this.logger.info('Query matched several concepts at the same tier', {
        query,
        matchType: hit.matchType,
        candidates,
      })
      warnings.push({
        type: 'ambiguous_match',
        message: `Query matched ${candidates.length} distinct concepts at ${hit.matchType}; chose ${candidates[0]}`,
        matchType: hit.matchType,
        candidates,
      })
    }

    const record = await this.resolveMerged(chosen, warnings)
    const sourceMeta = await this.sourceMetaFor(record)
    return { query, matchType: hit.matchType, record, sourceMeta, warnings }
  }

  /**
   * Corpus-wide best tier, records ordered by source priority
   */
  private async bestTier(query: string): Promise<TierHit> {
    if (query.length === 0) return NO_HIT

    for (const { matchType, field } of MATCH_TIERS) {
      const ids = await this.store.lookupByField(field, query)
      const records = await this.fetchRecords(ids)
      if (records.length > 0) {
        return { matchType, records: records.sort(compareSourcePriority) }
      }
    }
    return NO_HIT
  }

  /**
   * Best tier of each requested source. Tiers stop being evaluated once
   * every source has a hit.
   */
  private async bestTierPerSource(
    query: string,
    sources: readonly SourceName[]
  ): Promise<Map<SourceName, TierHit>> {
    const hits = new Map<SourceName, TierHit>()
    if (query.length === 0) return hits

    const pending = new Set(sources)
    for (const { matchType, field } of MATCH_TIERS) {
      if (pending.size === 0) break

      const ids = await this.store.lookupByField(field, query)
      const records = await this.fetchRecords(ids)
      for (const source of Array.from(pending)) {
        const matched = records.filter((record) => record.sourceName === source)
        if (matched.length > 0) {
          hits.set(source, { matchType, records: matched })
          pending.delete(source)
        }
      }
    }
    return hits
  }

  /**
   * Loads records for ids returned by a lookup, keeping their order
   */
  private async fetchRecords(ids: string[]): Promise<SourceRecord[]> {
    const records: SourceRecord[] = []
    for (const id of ids) {
      const record = await this.store.getSourceRecord(id)
      if (record) records.push(record)
    }
    return records
  }

  /**
   * Merge refs of the given records in order, without repeats
   */
  private distinctMergeRefs(records: SourceRecord[]): string[] {
    const seen = new Set<string>()
    const refs: string[] = []
    for (const record of records) {
      const ref = record.mergeRef ?? record.conceptId
      const key = foldCase(ref)
      if (seen.has(key)) continue
      seen.add(key)
      refs.push(ref)
    }
    return refs
  }

  /**
   * Merged record behind a matched source record. A rebuild committed
   * between reading the record and reading its merge ref moves the ref, so
   * a missing merged record is retried with the re-read source record.
   */
  private async resolveMerged(
    matched: SourceRecord,
    warnings: QueryWarning[]
  ): Promise<MergedRecord> {
    let record = matched
    for (let attempt = 1; ; attempt++) {
      const mergeRef = record.mergeRef
      if (!mergeRef) {
        return this.merger.mergeSingleton(record)
      }
      const merged = await this.store.getMergedRecord(mergeRef)
      if (merged) return merged

      const current =
        attempt < MERGE_READ_ATTEMPTS
          ? await this.store.getSourceRecord(record.conceptId)
          : null
      if (!current || foldCase(current.mergeRef ?? '') === foldCase(mergeRef)) {
        return this.missingMerged(record, mergeRef, warnings)
      }
      this.logger.debug('Merge ref moved while reading; retrying', {
        conceptId: record.conceptId,
        from: mergeRef,
        to: current.mergeRef,
      })
      record = current
    }
  }

  private missingMerged(
    record: SourceRecord,
    mergeRef: string,
    warnings: QueryWarning[]
  ): MergedRecord {
    this.logger.error('Merge ref points at a missing merged record', {
      conceptId: record.conceptId,
      mergeRef,
    })
    warnings.push({
      type: 'merge_ref_missing',
      message: `Merged record ${mergeRef} for ${record.conceptId} was not found; returning the record on its own`,
      conceptId: record.conceptId,
      mergeRef,
    })
    return this.merger.mergeSingleton(record)
  }

  private async sourceMetaFor(
    record: MergedRecord
  ): Promise<Partial<Record<SourceName, SourceMeta>>> {
    const named = new Set<SourceName>()
    for (const conceptId of [record.conceptId, ...record.xrefs]) {
      const source = sourceForConceptId(conceptId)
      if (source) named.add(source)
    }

    const sourceMeta: Partial<Record<SourceName, SourceMeta>> = {}
    for (const source of SOURCE_NAMES) {
      if (!named.has(source)) continue
      const meta = await this.store.getSourceMetadata(source)
      if (meta) sourceMeta[source] = meta
    }
    return sourceMeta
  }

  private queryWarnings(query: string): QueryWarning[] {
    if (!NBSP_PATTERN.test(query)) return []

    this.logger.warn('Query contains non-breaking space characters', { query })
    return [
      {
        type: 'nbsp',
        message: 'Query contains non-breaking space characters, which might not match stored terms',
      },
    ]
  }

  private resolveSources(options: SearchOptions): SourceName[] {
    const include = this.parseFilter('include', options.include)
    const exclude = this.parseFilter('exclude', options.exclude)

    if (include.length > 0 && exclude.length > 0) {
      throw new ConflictingSourceFilterError(include, exclude)
    }
    if (include.length > 0) {
      return SOURCE_NAMES.filter((source) => include.includes(source))
    }
    return SOURCE_NAMES.filter((source) => !exclude.includes(source))
  }

  private parseFilter(
    parameterName: string,
    filter: SourceFilter | undefined
  ): SourceName[] {
    if (filter === undefined) return []

    const names = typeof filter === 'string' ? filter.split(',') : filter
    const sources: SourceName[] = []
    for (const name of names) {
      if (name.trim().length === 0) continue
      const source = parseSourceName(name)
      if (!source) {
        throw new UnknownSourceError(parameterName, name.trim())
      }
      sources.push(source)
    }
    return sources
  }

  private checkQuery(query: unknown): void {
    if (typeof query !== 'string') {
      throw new InvalidParameterError('query', query, 'must be a string')
    }
  }
}
