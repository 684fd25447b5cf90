/**
 * Immutable view of all source records taken for one rebuild
 * @module graph/source-snapshot
 */

import type { SourceRecord } from '../types/record.js'
import { compareSourcePriority } from '../types/source.js'
import { foldCase } from '../utils/strings.js'

function frozenCopy(values: string[]): string[] {
  const copy = [...values]
  Object.freeze(copy)
  return copy
}

function freezeRecord(record: SourceRecord): Readonly<SourceRecord> {
  return Object.freeze({
    ...record,
    aliases: frozenCopy(record.aliases),
    xrefs: frozenCopy(record.xrefs),
    associatedWith: frozenCopy(record.associatedWith),
  })
}

/**
 * A single, read-only collection of source records.
 * Every rebuild takes its own snapshot; nothing is shared between rebuilds.
 *
 * @example
 * ```typescript
 * const snapshot = SourceSnapshot.from(await store.loadAllSourceRecords())
 * const { groups, issues } = new XrefGraphBuilder().build(snapshot)
 * ```
 */
export class SourceSnapshot {
  readonly records: ReadonlyArray<Readonly<SourceRecord>>
  private readonly byFoldedId: ReadonlyMap<string, Readonly<SourceRecord>>

  private constructor(records: ReadonlyArray<Readonly<SourceRecord>>) {
    this.records = records
    const index = new Map<string, Readonly<SourceRecord>>()
    for (const record of records) {
      const key = foldCase(record.conceptId)
      const existing = index.get(key)
      if (!existing || compareSourcePriority(record, existing) < 0) {
        index.set(key, record)
      }
    }
    this.byFoldedId = index
  }

  static from(records: Iterable<SourceRecord>): SourceSnapshot {
    return new SourceSnapshot(Object.freeze(Array.from(records, freezeRecord)))
  }

  get size(): number {
    return this.records.length
  }

  /**
   * Record with the given concept id, compared case-insensitively.
   * Among duplicates, the one ranked first by source priority.
   */
  get(conceptId: string): Readonly<SourceRecord> | undefined {
    return this.byFoldedId.get(foldCase(conceptId))
  }
}
