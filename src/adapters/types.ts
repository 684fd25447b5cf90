import type { LookupField } from '../types/match.js'
import type { MergeCommit, MergedRecord, SourceRecord } from '../types/record.js'
import type { SourceMeta, SourceName } from '../types/source.js'
import type { Logger } from '../utils/logger.js'

/**
 * Storage collaborator consumed by the rebuilder and the match engine.
 * Every lookup is case-insensitive; stored values keep the casing they were
 * written with.
 *
 * @example
 * ```typescript
 * const store = new MemoryDiseaseStore()
 * await store.addSourceRecords(records)
 * const ids = await store.lookupByField('alias', 'nsclc')
 * ```
 */
export interface DiseaseStore {
  /**
   * Read every source record currently stored.
   * Used once per rebuild to take the snapshot.
   */
  loadAllSourceRecords(): Promise<SourceRecord[]>

  /**
   * Atomically replace the whole merged set.
   * Each commit carries the merged record and the concept ids whose
   * `mergeRef` should point at it. Records not named in any commit end up
   * with a `null` merge ref. On failure the previous set stays visible.
   *
   * @param commits - Complete replacement set
   *
   * @example
   * ```typescript
   * await store.replaceMergedRecords([
   *   { record: merged, memberIds: ['ncit:C2926', 'mondo:0005233'] },
   * ])
   * ```
   */
  replaceMergedRecords(commits: MergeCommit[]): Promise<void>

  /**
   * Concept ids of source records whose `field` equals `value`,
   * compared case-insensitively, in canonical order.
   */
  lookupByField(field: LookupField, value: string): Promise<string[]>

  /**
   * One source record by concept id, or `null` when absent
   */
  getSourceRecord(conceptId: string): Promise<SourceRecord | null>

  /**
   * One merged record by merge ref, or `null` when absent
   */
  getMergedRecord(conceptId: string): Promise<MergedRecord | null>

  /**
   * Insert source records. A record whose concept id is already stored
   * (case-insensitively) replaces the stored one. Every concept id must
   * carry its source's namespace prefix, so ids never collide across
   * sources.
   */
  addSourceRecords(records: SourceRecord[]): Promise<void>

  /**
   * Remove every record of one source.
   *
   * @returns Number of records removed
   */
  deleteSource(sourceName: SourceName): Promise<number>

  /**
   * Swap every record of one source for `records` in one step.
   * The batch is validated before anything is removed; on failure the
   * source keeps its previous records. Merge refs of concept ids present
   * before and after are kept until the next rebuild.
   *
   * @returns Number of records removed
   */
  replaceSource(sourceName: SourceName, records: SourceRecord[]): Promise<number>

  addSourceMetadata(sourceName: SourceName, meta: SourceMeta): Promise<void>

  getSourceMetadata(sourceName: SourceName): Promise<SourceMeta | null>
}

/**
 * Options shared by every store implementation
 */
export interface StoreOptions {
  /** Number of rows written per insert statement */
  batchSize?: number
  logger?: Logger
}
