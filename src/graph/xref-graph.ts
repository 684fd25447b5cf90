/**
 * Cross-reference graph construction and merge-group discovery
 * @module graph/xref-graph
 */

import type { MergeGroup, SourceRecord } from '../types/record.js'
import {
  compareSourcePriority,
  sourceForConceptId,
  sourceRank,
} from '../types/source.js'
import type { DataIntegrityIssue, GroupingResult } from '../merge/types.js'
import { compareCanonical, foldCase, sortCanonical } from '../utils/strings.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { DisjointSet } from './union-find.js'
import type { SourceSnapshot } from './source-snapshot.js'

interface Vertex {
  record: Readonly<SourceRecord>
  key: string
  /** Excluded vertices stay singletons and take part in no edge */
  excluded: boolean
}

/**
 * Options for the graph builder
 */
export interface XrefGraphBuilderOptions {
  logger?: Logger
}

/**
 * Builds the undirected cross-reference graph over a snapshot and splits it
 * into merge groups.
 *
 * Every edge is canonicalized (endpoints ordered by case-folded concept id),
 * deduplicated and sorted before union, so identical input always yields
 * identical groups and merge refs.
 *
 * @example
 * ```typescript
 * const builder = new XrefGraphBuilder({ logger })
 * const { groups, issues } = builder.build(SourceSnapshot.from(records))
 * ```
 */
export class XrefGraphBuilder {
  private readonly logger: Logger

  constructor(options: XrefGraphBuilderOptions = {}) {
    this.logger = options.logger ?? createSilentLogger()
  }

  build(snapshot: SourceSnapshot): GroupingResult {
    const issues: DataIntegrityIssue[] = []
    const vertices = this.collectVertices(snapshot, issues)
    const indexByKey = new Map<string, number>()
    vertices.forEach((vertex, index) => indexByKey.set(vertex.key, index))

    const edges = this.collectEdges(vertices, indexByKey, issues)
    let components = connectedComponents(vertices.length, edges)

    const detached = this.detachSameSource(vertices, components, issues)
    if (detached.size > 0) {
      components = connectedComponents(
        vertices.length,
        edges.filter(([a, b]) => !detached.has(a) && !detached.has(b))
      )
    }

    const groups: MergeGroup[] = []
    for (const component of components) {
      const members = component.map((index) => vertices[index].record)
      groups.push({
        mergeRef: selectMergeRef(members),
        memberIds: members.map((member) => member.conceptId),
      })
    }
    groups.sort((a, b) => compareCanonical(a.mergeRef, b.mergeRef))

    this.logger.debug('Built cross-reference graph', {
      vertices: vertices.length,
      edges: edges.length,
      groups: groups.length,
      issues: issues.length,
    })

    return { groups, issues }
  }

  /**
   * Keeps one vertex per case-folded concept id and flags records that
   * cannot take part in grouping
   */
  private collectVertices(
    snapshot: SourceSnapshot,
    issues: DataIntegrityIssue[]
  ): Vertex[] {
    const candidates = [...snapshot.records].sort(compareSourcePriority)
    const kept = new Map<string, Vertex>()

    for (const record of candidates) {
      const key = foldCase(record.conceptId)
      const existing = kept.get(key)
      if (existing) {
        issues.push({
          kind: 'duplicate_concept_id',
          conceptId: record.conceptId,
          relatedId: existing.record.conceptId,
          detail: `Concept id ${record.conceptId} (${record.sourceName}) duplicates ${existing.record.conceptId} (${existing.record.sourceName}); record dropped`,
        })
        continue
      }

      let excluded = false
      if (sourceRank(record.sourceName) === undefined) {
        issues.push({
          kind: 'unknown_source',
          conceptId: record.conceptId,
          detail: `Source '${record.sourceName}' has no priority rank; record left ungrouped`,
        })
        excluded = true
      } else if (sourceForConceptId(record.conceptId) !== record.sourceName) {
        issues.push({
          kind: 'prefix_mismatch',
          conceptId: record.conceptId,
          detail: `Concept id prefix does not belong to source '${record.sourceName}'; record left ungrouped`,
        })
        excluded = true
      }

      kept.set(key, { record, key, excluded })
    }

    return Array.from(kept.values()).sort((a, b) =>
      compareCanonical(a.record.conceptId, b.record.conceptId)
    )
  }

  private collectEdges(
    vertices: Vertex[],
    indexByKey: Map<string, number>,
    issues: DataIntegrityIssue[]
  ): Array<[number, number]> {
    const seen = new Set<string>()
    const edges: Array<[number, number]> = []

    vertices.forEach((vertex, index) => {
      if (vertex.excluded) return

      const targets = new Set<string>()
      for (const xref of sortCanonical(vertex.record.xrefs)) {
        const targetKey = foldCase(xref)
        if (targets.has(targetKey)) continue
        targets.add(targetKey)

        if (targetKey === vertex.key) {
          issues.push({
            kind: 'self_reference',
            conceptId: vertex.record.conceptId,
            relatedId: xref,
            detail: `Record lists itself as a cross-reference`,
          })
          continue
        }

        const target = indexByKey.get(targetKey)
        if (target === undefined) {
          issues.push({
            kind: 'dangling_xref',
            conceptId: vertex.record.conceptId,
            relatedId: xref,
            detail: `Cross-reference ${xref} does not resolve to an ingested concept`,
          })
          continue
        }
        if (vertices[target].excluded) continue

        const a = Math.min(index, target)
        const b = Math.max(index, target)
        const edgeKey = `${a}:${b}`
        if (!seen.has(edgeKey)) {
          seen.add(edgeKey)
          edges.push([a, b])
        }
      }
    })

    return edges.sort((x, y) => x[0] - y[0] || x[1] - y[1])
  }

  /**
   * A component may hold at most one record per source. Every further
   * record of a source (after the best-ranked one) is reported and detached,
   * together with all of its edges.
   *
   * @returns Indices of the detached vertices
   */
  private detachSameSource(
    vertices: Vertex[],
    components: number[][],
    issues: DataIntegrityIssue[]
  ): Set<number> {
    const detached = new Set<number>()

    for (const component of components) {
      if (component.length < 2) continue

      const ranked = [...component].sort((a, b) =>
        compareSourcePriority(vertices[a].record, vertices[b].record)
      )
      const firstBySource = new Map<string, string>()
      for (const index of ranked) {
        const member = vertices[index].record
        const first = firstBySource.get(member.sourceName)
        if (first === undefined) {
          firstBySource.set(member.sourceName, member.conceptId)
          continue
        }
        issues.push({
          kind: 'same_source_conflict',
          conceptId: member.conceptId,
          relatedId: first,
          detail: `Group already contains ${first} from ${member.sourceName}; record left ungrouped`,
        })
        detached.add(index)
      }
    }

    return detached
  }
}

function connectedComponents(size: number, edges: Array<[number, number]>): number[][] {
  const forest = new DisjointSet(size)
  for (const [a, b] of edges) {
    forest.union(a, b)
  }
  return forest.components()
}

/**
 * Chooses the canonical member of a group: best source priority, then the
 * smallest concept id in canonical order
 */
export function selectMergeRef(
  members: ReadonlyArray<Pick<SourceRecord, 'conceptId' | 'sourceName'>>
): string {
  const [first] = [...members].sort(compareSourcePriority)
  if (!first) {
    throw new RangeError('Cannot select a merge_ref for an empty group')
  }
  return first.conceptId
}
