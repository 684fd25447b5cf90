/**
 * Batch rebuild of every merge group from the stored source records
 * @module merge/merge-rebuilder
 */

import type { DiseaseStore } from '../adapters/types.js'
import { SourceSnapshot } from '../graph/source-snapshot.js'
import { XrefGraphBuilder } from '../graph/xref-graph.js'
import type { MergeCommit, SourceRecord } from '../types/record.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { RebuildFailure } from './merge-error.js'
import { RecordMerger } from './record-merger.js'
import { summarizeIssues, type RebuildResult } from './types.js'

export interface MergeRebuilderOptions {
  logger?: Logger
  merger?: RecordMerger
}

/**
 * MergeRebuilder - snapshot, group, merge and commit in one pass
 *
 * The store sees either the complete replacement set or nothing. A storage
 * failure while loading or committing raises {@link RebuildFailure} and the
 * previously committed merged set stays visible.
 *
 * @example
 * ```typescript
 * const rebuilder = new MergeRebuilder(store, { logger })
 * const result = await rebuilder.rebuild()
 * console.log(result.groupCount, result.integrity.total)
 * ```
 */
export class MergeRebuilder {
  private readonly logger: Logger
  private readonly merger: RecordMerger
  private readonly graphBuilder: XrefGraphBuilder

  constructor(
    private readonly store: DiseaseStore,
    options: MergeRebuilderOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
    this.merger = options.merger ?? new RecordMerger()
    this.graphBuilder = new XrefGraphBuilder({ logger: this.logger })
  }

  async rebuild(): Promise<RebuildResult> {
    const startTime = Date.now()

    let records: SourceRecord[]
    try {
      records = await this.store.loadAllSourceRecords()
    } catch (error) {
      throw new RebuildFailure('load', error)
    }

    const snapshot = SourceSnapshot.from(records)
    const { groups, issues } = this.graphBuilder.build(snapshot)

    const commits: MergeCommit[] = []
    let multiMemberGroupCount = 0
    let mergedMemberCount = 0
    for (const group of groups) {
      const members: Array<Readonly<SourceRecord>> = []
      for (const memberId of group.memberIds) {
        const member = snapshot.get(memberId)
        if (member) members.push(member)
      }
      if (members.length > 1) {
        multiMemberGroupCount++
        mergedMemberCount += members.length
      }
      commits.push({
        record: this.merger.merge(group, members),
        memberIds: members.map((member) => member.conceptId),
      })
    }

    try {
      await this.store.replaceMergedRecords(commits)
    } catch (error) {
      throw new RebuildFailure('commit', error)
    }

    const integrity = summarizeIssues(issues)
    if (integrity.total > 0) {
      this.logger.warn('Data integrity issues found during merge rebuild', {
        total: integrity.total,
        byKind: integrity.byKind,
        sample: issues.slice(0, 5).map((issue) => `${issue.kind}: ${issue.conceptId}`),
      })
    }

    const durationMs = Date.now() - startTime
    this.logger.info('Merge rebuild complete', {
      records: snapshot.size,
      groups: groups.length,
      multiMemberGroups: multiMemberGroupCount,
      durationMs,
    })

    return {
      success: true,
      groupCount: groups.length,
      multiMemberGroupCount,
      mergedMemberCount,
      integrity,
      issues,
      durationMs,
    }
  }
}

