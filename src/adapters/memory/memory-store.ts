/**
 * In-process disease store
 * @module adapters/memory/memory-store
 */

import { BaseDiseaseStore } from '../base-adapter.js'
import type { StoreOptions } from '../types.js'
import { LOOKUP_FIELDS, type LookupField } from '../../types/match.js'
import type { MergeCommit, MergedRecord, SourceRecord } from '../../types/record.js'
import type { SourceMeta, SourceName } from '../../types/source.js'
import { foldCase, sortCanonical } from '../../utils/strings.js'

/**
 * Everything a committed rebuild produced. Replaced as a whole, never
 * modified in place.
 */
interface MergeGeneration {
  readonly merged: ReadonlyMap<string, MergedRecord>
  /** Folded concept id -> merge ref */
  readonly mergeRefs: ReadonlyMap<string, string>
}

type ValueIndex = Map<string, Set<string>>

const EMPTY_GENERATION: MergeGeneration = {
  merged: new Map(),
  mergeRefs: new Map(),
}

function copySourceRecord(record: SourceRecord, mergeRef: string | null): SourceRecord {
  return {
    ...record,
    aliases: [...record.aliases],
    xrefs: [...record.xrefs],
    associatedWith: [...record.associatedWith],
    mergeRef,
  }
}

function copyMergedRecord(record: MergedRecord): MergedRecord {
  return {
    ...record,
    aliases: [...record.aliases],
    xrefs: [...record.xrefs],
    associatedWith: [...record.associatedWith],
  }
}

function valuesFor(record: SourceRecord, field: LookupField): string[] {
  switch (field) {
    case 'concept_id':
      return [record.conceptId]
    case 'label':
      return record.label ? [record.label] : []
    case 'alias':
      return record.aliases
    case 'xref':
      return record.xrefs
    case 'associated_with':
      return record.associatedWith
  }
}

/**
 * MemoryDiseaseStore - hash-map backed store for tests, the CLI's
 * file-based mode and small corpora
 *
 * Every lookup field has its own index keyed by the lower-cased value.
 * Merged records and merge refs live in one immutable generation that
 * `replaceMergedRecords` swaps in a single assignment, so readers see
 * either the old set or the new one.
 *
 * @example
 * ```typescript
 * const store = new MemoryDiseaseStore()
 * await store.addSourceRecords(records)
 * const normalizer = new NormalizerBuilder().storage(store).build()
 * await normalizer.rebuildMerges()
 * ```
 */
export class MemoryDiseaseStore extends BaseDiseaseStore {
  private readonly records = new Map<string, SourceRecord>()
  private readonly indexes = new Map<LookupField, ValueIndex>()
  private readonly metadata = new Map<SourceName, SourceMeta>()
  private generation: MergeGeneration = EMPTY_GENERATION

  constructor(options: StoreOptions = {}) {
    super(options)
  }

  async loadAllSourceRecords(): Promise<SourceRecord[]> {
    return Array.from(this.records.values(), (record) =>
      copySourceRecord(record, this.mergeRefFor(record.conceptId))
    )
  }

  async replaceMergedRecords(commits: MergeCommit[]): Promise<void> {
    this.validateCommits(commits)

    const merged = new Map<string, MergedRecord>()
    const mergeRefs = new Map<string, string>()
    for (const { record, memberIds } of commits) {
      merged.set(foldCase(record.conceptId), copyMergedRecord(record))
      for (const memberId of memberIds) {
        mergeRefs.set(foldCase(memberId), record.conceptId)
      }
    }

    this.generation = { merged, mergeRefs }
    this.logger.debug('Merged record set replaced', { merged: merged.size })
  }

  async lookupByField(field: LookupField, value: string): Promise<string[]> {
    const keys = this.indexes.get(field)?.get(foldCase(value))
    if (!keys) return []

    const conceptIds: string[] = []
    for (const key of keys) {
      const record = this.records.get(key)
      if (record) conceptIds.push(record.conceptId)
    }
    return sortCanonical(conceptIds)
  }

  async getSourceRecord(conceptId: string): Promise<SourceRecord | null> {
    const record = this.records.get(foldCase(conceptId))
    return record ? copySourceRecord(record, this.mergeRefFor(record.conceptId)) : null
  }

  async getMergedRecord(conceptId: string): Promise<MergedRecord | null> {
    const record = this.generation.merged.get(foldCase(conceptId))
    return record ? copyMergedRecord(record) : null
  }

  async addSourceRecords(records: SourceRecord[]): Promise<void> {
    this.validateRecords(records)
    this.putRecords(records)
  }

  async deleteSource(sourceName: SourceName): Promise<number> {
    return this.removeSource(sourceName)
  }

  async replaceSource(sourceName: SourceName, records: SourceRecord[]): Promise<number> {
    this.validateSourceBatch(sourceName, records)
    const removed = this.removeSource(sourceName)
    this.putRecords(records)
    return removed
  }

  async addSourceMetadata(sourceName: SourceName, meta: SourceMeta): Promise<void> {
    this.metadata.set(sourceName, {
      ...meta,
      dataLicenseAttributes: { ...meta.dataLicenseAttributes },
    })
  }

  async getSourceMetadata(sourceName: SourceName): Promise<SourceMeta | null> {
    const meta = this.metadata.get(sourceName)
    return meta
      ? { ...meta, dataLicenseAttributes: { ...meta.dataLicenseAttributes } }
      : null
  }

  private putRecords(records: SourceRecord[]): void {
    for (const incoming of records) {
      const key = foldCase(incoming.conceptId)
      const existing = this.records.get(key)
      if (existing) this.unindex(key, existing)

      const stored = this.toStoredRecord(incoming)
      this.records.set(key, stored)
      this.index(key, stored)
    }
  }

  private removeSource(sourceName: SourceName): number {
    let removed = 0
    for (const [key, record] of this.records) {
      if (record.sourceName !== sourceName) continue
      this.unindex(key, record)
      this.records.delete(key)
      removed++
    }
    this.logger.debug('Source records deleted', { sourceName, removed })
    return removed
  }

  private mergeRefFor(conceptId: string): string | null {
    return this.generation.mergeRefs.get(foldCase(conceptId)) ?? null
  }

  private index(key: string, record: SourceRecord): void {
    for (const field of LOOKUP_FIELDS) {
      let index = this.indexes.get(field)
      if (!index) {
        index = new Map()
        this.indexes.set(field, index)
      }
      for (const value of valuesFor(record, field)) {
        const valueKey = foldCase(value)
        let keys = index.get(valueKey)
        if (!keys) {
          keys = new Set()
          index.set(valueKey, keys)
        }
        keys.add(key)
      }
    }
  }

  private unindex(key: string, record: SourceRecord): void {
    for (const [field, index] of this.indexes) {
      for (const value of valuesFor(record, field)) {
        const valueKey = foldCase(value)
        const keys = index.get(valueKey)
        if (!keys) continue
        keys.delete(key)
        if (keys.size === 0) index.delete(valueKey)
      }
    }
  }
}
