/**
 * Synthesizes one merged record per merge group
 * @module merge/record-merger
 */

import type { MergeGroup, MergedRecord, SourceRecord } from '../types/record.js'
import { compareSourcePriority } from '../types/source.js'
import { foldCase } from '../utils/strings.js'
import { MergeValidationError } from './merge-error.js'
import { anyTrue, preferNonEmpty, unionCaseInsensitive } from './strategies.js'

type MemberRecord = Readonly<SourceRecord>

/**
 * RecordMerger - combines the members of a merge group into one record
 *
 * - `label` - merge_ref's label, else the first non-empty label by source priority
 * - `aliases` - every member label and alias other than the chosen label
 * - `xrefs` - non-primary member ids plus all declared xrefs, merge_ref excluded
 * - `associatedWith` - union of all members
 * - flags - logical OR
 *
 * Output depends only on the set of member records, never on their order.
 *
 * @example
 * ```typescript
 * const merger = new RecordMerger()
 * const merged = merger.merge(
 *   { mergeRef: 'ncit:C2926', memberIds: ['DOID:3908', 'mondo:0005233', 'ncit:C2926'] },
 *   [doRecord, mondoRecord, ncitRecord]
 * )
 * ```
 */
export class RecordMerger {
  merge(group: MergeGroup, records: ReadonlyArray<MemberRecord>): MergedRecord {
    const ordered = this.validate(group, records)
    const primary = ordered.find(
      (record) => foldCase(record.conceptId) === foldCase(group.mergeRef)
    )
    if (!primary) {
      throw new MergeValidationError(
        'mergeRef',
        `no record supplied for merge_ref ${group.mergeRef}`,
        { mergeRef: group.mergeRef }
      )
    }

    const label = preferNonEmpty([
      primary.label,
      ...ordered.map((record) => record.label),
    ])

    const aliases = unionCaseInsensitive(
      ordered.map((record) =>
        record.label ? [record.label, ...record.aliases] : record.aliases
      ),
      [label]
    )

    const xrefs = unionCaseInsensitive(
      [
        ordered
          .filter((record) => record !== primary)
          .map((record) => record.conceptId),
        ...ordered.map((record) => record.xrefs),
      ],
      [primary.conceptId]
    )

    return {
      conceptId: primary.conceptId,
      label,
      aliases,
      xrefs,
      associatedWith: unionCaseInsensitive(
        ordered.map((record) => record.associatedWith)
      ),
      pediatricDisease: anyTrue(ordered.map((record) => record.pediatricDisease)),
      oncologicDisease: anyTrue(ordered.map((record) => record.oncologicDisease)),
    }
  }

  /**
   * Builds the merged form of a record that belongs to no group
   */
  mergeSingleton(record: MemberRecord): MergedRecord {
    return this.merge(
      { mergeRef: record.conceptId, memberIds: [record.conceptId] },
      [record]
    )
  }

  /**
   * Checks that every record is a member and returns them by source priority
   */
  private validate(
    group: MergeGroup,
    records: ReadonlyArray<MemberRecord>
  ): MemberRecord[] {
    if (records.length === 0) {
      throw new MergeValidationError('records', 'at least one record is required', {
        mergeRef: group.mergeRef,
      })
    }

    const members = new Set(group.memberIds.map(foldCase))
    for (const record of records) {
      if (!members.has(foldCase(record.conceptId))) {
        throw new MergeValidationError(
          'records',
          `${record.conceptId} is not a member of group ${group.mergeRef}`,
          { mergeRef: group.mergeRef, conceptId: record.conceptId }
        )
      }
    }

    return [...records].sort(compareSourcePriority)
  }
}
