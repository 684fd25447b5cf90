import type { DiseaseStore, StoreOptions } from './types.js'
import type { LookupField } from '../types/match.js'
import type { MergeCommit, MergedRecord, SourceRecord } from '../types/record.js'
import {
  isSourceName,
  sourceForConceptId,
  type SourceMeta,
  type SourceName,
} from '../types/source.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { foldCase, uniqueAsWritten } from '../utils/strings.js'
import { ValidationError } from './adapter-error.js'

const DEFAULT_BATCH_SIZE = 500

/**
 * Abstract base class providing common functionality for disease stores.
 * Concrete stores (memory, Drizzle) extend this class and implement the
 * storage-specific methods.
 */
export abstract class BaseDiseaseStore implements DiseaseStore {
  protected readonly batchSize: number
  protected readonly logger: Logger

  /**
   * @throws {ValidationError} If `batchSize` is not a positive integer
   */
  constructor(options: StoreOptions = {}) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ValidationError('batchSize must be a positive integer', {
        batchSize,
      })
    }
    this.batchSize = batchSize
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Checks the shape of one incoming source record.
   *
   * @throws {ValidationError} If a required field is missing or mistyped
   */
  protected validateRecord(record: SourceRecord): void {
    if (typeof record.conceptId !== 'string' || record.conceptId.length === 0) {
      throw new ValidationError('conceptId must be a non-empty string', {
        conceptId: record.conceptId,
      })
    }
    if (!isSourceName(record.sourceName)) {
      throw new ValidationError(`Unknown source '${String(record.sourceName)}'`, {
        conceptId: record.conceptId,
      })
    }
    if (sourceForConceptId(record.conceptId) !== record.sourceName) {
      throw new ValidationError(
        `Concept id ${record.conceptId} does not carry the ${record.sourceName} prefix`,
        { conceptId: record.conceptId, sourceName: record.sourceName }
      )
    }
    for (const field of ['aliases', 'xrefs', 'associatedWith'] as const) {
      const values: unknown = record[field]
      if (
        !Array.isArray(values) ||
        !values.every((value) => typeof value === 'string')
      ) {
        throw new ValidationError(`${field} must be an array of strings`, {
          conceptId: record.conceptId,
        })
      }
    }
  }

  /**
   * Validates a list of records and rejects case-insensitive duplicates
   * within the same call.
   */
  protected validateRecords(records: SourceRecord[]): void {
    const seen = new Set<string>()
    for (const record of records) {
      this.validateRecord(record)
      const key = foldCase(record.conceptId)
      if (seen.has(key)) {
        throw new ValidationError(
          `Concept id ${record.conceptId} appears more than once in one batch`,
          { conceptId: record.conceptId }
        )
      }
      seen.add(key)
    }
  }

  /**
   * Validates the full replacement set of one source
   */
  protected validateSourceBatch(sourceName: SourceName, records: SourceRecord[]): void {
    this.validateRecords(records)
    const foreign = records.find((record) => record.sourceName !== sourceName)
    if (foreign) {
      throw new ValidationError(
        `Record ${foreign.conceptId} belongs to ${foreign.sourceName}, not ${sourceName}`,
        { conceptId: foreign.conceptId, sourceName }
      )
    }
  }

  /**
   * Checks that a replacement set names every merged record and every
   * member at most once.
   */
  protected validateCommits(commits: MergeCommit[]): void {
    const refs = new Set<string>()
    const members = new Set<string>()
    for (const { record, memberIds } of commits) {
      const ref = foldCase(record.conceptId)
      if (refs.has(ref)) {
        throw new ValidationError(
          `Merged record ${record.conceptId} committed twice`,
          { conceptId: record.conceptId }
        )
      }
      refs.add(ref)
      for (const memberId of memberIds) {
        const key = foldCase(memberId)
        if (members.has(key)) {
          throw new ValidationError(
            `Concept id ${memberId} assigned to more than one merged record`,
            { conceptId: memberId, mergeRef: record.conceptId }
          )
        }
        members.add(key)
      }
    }
  }

  /**
   * Copy of a record as it is kept in storage: set fields deduplicated as
   * written, optional fields filled in, `mergeRef` cleared.
   */
  protected toStoredRecord(record: SourceRecord): SourceRecord {
    return {
      conceptId: record.conceptId,
      sourceName: record.sourceName,
      label: record.label ?? null,
      aliases: uniqueAsWritten(record.aliases),
      xrefs: uniqueAsWritten(record.xrefs),
      associatedWith: uniqueAsWritten(record.associatedWith),
      pediatricDisease: record.pediatricDisease ?? null,
      oncologicDisease: record.oncologicDisease ?? null,
      mergeRef: null,
    }
  }

  /**
   * Splits work into batches of `batchSize`
   */
  protected chunk<T>(items: T[]): T[][] {
    const batches: T[][] = []
    for (let i = 0; i < items.length; i += this.batchSize) {
      batches.push(items.slice(i, i + this.batchSize))
    }
    return batches
  }

  abstract loadAllSourceRecords(): Promise<SourceRecord[]>

  abstract replaceMergedRecords(commits: MergeCommit[]): Promise<void>

  abstract lookupByField(field: LookupField, value: string): Promise<string[]>

  abstract getSourceRecord(conceptId: string): Promise<SourceRecord | null>

  abstract getMergedRecord(conceptId: string): Promise<MergedRecord | null>

  abstract addSourceRecords(records: SourceRecord[]): Promise<void>

  abstract deleteSource(sourceName: SourceName): Promise<number>

  abstract replaceSource(sourceName: SourceName, records: SourceRecord[]): Promise<number>

  abstract addSourceMetadata(sourceName: SourceName, meta: SourceMeta): Promise<void>

  abstract getSourceMetadata(sourceName: SourceName): Promise<SourceMeta | null>
}
