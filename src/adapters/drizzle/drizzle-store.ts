/**
 * PostgreSQL disease store written against Drizzle ORM
 * @module adapters/drizzle/drizzle-store
 */

import { BaseDiseaseStore } from '../base-adapter.js'
import { QueryError, TransactionError } from '../adapter-error.js'
import type { StoreOptions } from '../types.js'
import type { LookupField } from '../../types/match.js'
import type {
  DiseaseFlag,
  MergeCommit,
  MergedRecord,
  SourceRecord,
} from '../../types/record.js'
import { isSourceName, type SourceMeta, type SourceName } from '../../types/source.js'
import { errorMessage } from '../../utils/errors.js'
import { foldCase, sortCanonical } from '../../utils/strings.js'
import {
  diseaseConcepts,
  diseaseMerged,
  diseaseRefs,
  diseaseSources,
} from './schema.js'

type Row = Record<string, unknown>

export interface DrizzleQuery extends PromiseLike<Row[]> {
  where(condition: unknown): DrizzleQuery
  limit(count: number): DrizzleQuery
}

export interface DrizzleMutation extends PromiseLike<unknown> {
  where(condition: unknown): PromiseLike<unknown>
}

/**
 * The subset of a Drizzle database the store calls
 */
export interface DrizzleDatabase {
  select(fields?: Record<string, unknown>): { from(table: unknown): DrizzleQuery }
  insert(table: unknown): { values(values: unknown): PromiseLike<unknown> }
  update(table: unknown): { set(values: unknown): DrizzleMutation }
  delete(table: unknown): DrizzleMutation
  transaction<R>(callback: (tx: DrizzleDatabase) => Promise<R>): Promise<R>
}

/**
 * Drizzle operators, passed in so the store carries no dialect of its own
 */
export interface DrizzleOperators {
  eq(column: unknown, value: unknown): unknown
  and(...conditions: unknown[]): unknown
  inArray(column: unknown, values: unknown[]): unknown
}

function readString(row: Row, key: string): string {
  const value = row[key]
  if (typeof value !== 'string') {
    throw new QueryError(`Column '${key}' is not a string`, { key, value })
  }
  return value
}

function readOptionalString(row: Row, key: string): string | null {
  const value = row[key]
  if (value === null || value === undefined) return null
  return readString(row, key)
}

function readStringArray(row: Row, key: string): string[] {
  const value = row[key]
  if (!Array.isArray(value)) {
    throw new QueryError(`Column '${key}' is not an array`, { key, value })
  }
  return value.map((item) => {
    if (typeof item !== 'string') {
      throw new QueryError(`Column '${key}' holds a non-string value`, { key, item })
    }
    return item
  })
}

function readFlag(row: Row, key: string): DiseaseFlag {
  const value = row[key]
  if (value === null || value === undefined) return null
  if (typeof value !== 'boolean') {
    throw new QueryError(`Column '${key}' is not a boolean`, { key, value })
  }
  return value
}

function readBoolean(row: Row, key: string): boolean {
  const value = readFlag(row, key)
  if (value === null) {
    throw new QueryError(`Column '${key}' is null`, { key })
  }
  return value
}

function toSourceRecord(row: Row): SourceRecord {
  const sourceName = readString(row, 'sourceName')
  if (!isSourceName(sourceName)) {
    throw new QueryError(`Unknown source '${sourceName}' in disease_concepts`, {
      conceptId: row.conceptId,
    })
  }
  return {
    conceptId: readString(row, 'conceptId'),
    sourceName,
    label: readOptionalString(row, 'label'),
    aliases: readStringArray(row, 'aliases'),
    xrefs: readStringArray(row, 'xrefs'),
    associatedWith: readStringArray(row, 'associatedWith'),
    pediatricDisease: readFlag(row, 'pediatricDisease'),
    oncologicDisease: readFlag(row, 'oncologicDisease'),
    mergeRef: readOptionalString(row, 'mergeRef'),
  }
}

function toMergedRecord(row: Row): MergedRecord {
  return {
    conceptId: readString(row, 'conceptId'),
    label: readString(row, 'label'),
    aliases: readStringArray(row, 'aliases'),
    xrefs: readStringArray(row, 'xrefs'),
    associatedWith: readStringArray(row, 'associatedWith'),
    pediatricDisease: readFlag(row, 'pediatricDisease'),
    oncologicDisease: readFlag(row, 'oncologicDisease'),
  }
}

function refRows(record: SourceRecord): Row[] {
  const rows: Row[] = []
  const push = (refType: LookupField, value: string) => {
    rows.push({
      conceptId: record.conceptId,
      conceptIdLower: foldCase(record.conceptId),
      refType,
      value,
      valueLower: foldCase(value),
    })
  }
  if (record.label) push('label', record.label)
  record.aliases.forEach((value) => push('alias', value))
  record.xrefs.forEach((value) => push('xref', value))
  record.associatedWith.forEach((value) => push('associated_with', value))
  return rows
}

function readMergeRefs(rows: Row[]): Map<string, string | null> {
  const mergeRefs = new Map<string, string | null>()
  for (const row of rows) {
    mergeRefs.set(readString(row, 'conceptIdLower'), readOptionalString(row, 'mergeRef'))
  }
  return mergeRefs
}

/**
 * DrizzleDiseaseStore - PostgreSQL store over the tables in `./schema`
 *
 * Case-insensitive lookups read the `*_lower` columns. Replacing the merged
 * set runs in one transaction; a failure rolls it back and the previous set
 * stays visible.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * import { and, eq, inArray } from 'drizzle-orm'
 * import pg from 'pg'
 *
 * const db = drizzle(new pg.Pool({ connectionString }))
 * const store = new DrizzleDiseaseStore(db, { eq, and, inArray })
 * ```
 */
export class DrizzleDiseaseStore extends BaseDiseaseStore {
  constructor(
    private readonly db: DrizzleDatabase,
    private readonly operators: DrizzleOperators,
    options: StoreOptions = {}
  ) {
    super(options)
  }

  async loadAllSourceRecords(): Promise<SourceRecord[]> {
    try {
      const rows = await this.db.select().from(diseaseConcepts)
      return rows.map(toSourceRecord)
    } catch (error) {
      throw new QueryError('Failed to load source records', {
        error: errorMessage(error),
      })
    }
  }

  async replaceMergedRecords(commits: MergeCommit[]): Promise<void> {
    this.validateCommits(commits)
    const { inArray } = this.operators

    try {
      await this.db.transaction(async (tx) => {
        await tx.delete(diseaseMerged)
        await tx.update(diseaseConcepts).set({ mergeRef: null })

        const rows = commits.map(({ record }) => ({
          conceptId: record.conceptId,
          conceptIdLower: foldCase(record.conceptId),
          label: record.label,
          aliases: record.aliases,
          xrefs: record.xrefs,
          associatedWith: record.associatedWith,
          pediatricDisease: record.pediatricDisease,
          oncologicDisease: record.oncologicDisease,
        }))
        for (const batch of this.chunk(rows)) {
          await tx.insert(diseaseMerged).values(batch)
        }

        for (const { record, memberIds } of commits) {
          const members = memberIds.map(foldCase)
          for (const batch of this.chunk(members)) {
            await tx
              .update(diseaseConcepts)
              .set({ mergeRef: record.conceptId })
              .where(inArray(diseaseConcepts.conceptIdLower, batch))
          }
        }
      })
      this.logger.debug('Merged record set replaced', { merged: commits.length })
    } catch (error) {
      throw new TransactionError('Failed to replace merged records', {
        commits: commits.length,
        error: errorMessage(error),
      })
    }
  }

  async lookupByField(field: LookupField, value: string): Promise<string[]> {
    const { eq, and } = this.operators
    const valueLower = foldCase(value)

    try {
      const rows =
        field === 'concept_id'
          ? await this.db
              .select({ conceptId: diseaseConcepts.conceptId })
              .from(diseaseConcepts)
              .where(eq(diseaseConcepts.conceptIdLower, valueLower))
          : await this.db
              .select({ conceptId: diseaseRefs.conceptId })
              .from(diseaseRefs)
              .where(
                and(eq(diseaseRefs.refType, field), eq(diseaseRefs.valueLower, valueLower))
              )
      const conceptIds = new Set(rows.map((row) => readString(row, 'conceptId')))
      return sortCanonical(conceptIds)
    } catch (error) {
      throw new QueryError(`Failed to look up ${field}`, {
        field,
        value,
        error: errorMessage(error),
      })
    }
  }

  async getSourceRecord(conceptId: string): Promise<SourceRecord | null> {
    try {
      const [row] = await this.db
        .select()
        .from(diseaseConcepts)
        .where(this.operators.eq(diseaseConcepts.conceptIdLower, foldCase(conceptId)))
        .limit(1)
      return row ? toSourceRecord(row) : null
    } catch (error) {
      throw new QueryError('Failed to read source record', {
        conceptId,
        error: errorMessage(error),
      })
    }
  }

  async getMergedRecord(conceptId: string): Promise<MergedRecord | null> {
    try {
      const [row] = await this.db
        .select()
        .from(diseaseMerged)
        .where(this.operators.eq(diseaseMerged.conceptIdLower, foldCase(conceptId)))
        .limit(1)
      return row ? toMergedRecord(row) : null
    } catch (error) {
      throw new QueryError('Failed to read merged record', {
        conceptId,
        error: errorMessage(error),
      })
    }
  }

  /**
   * Upserts records. A replaced record keeps its merge ref until the next
   * rebuild.
   */
  async addSourceRecords(records: SourceRecord[]): Promise<void> {
    if (records.length === 0) return
    this.validateRecords(records)
    const { inArray } = this.operators

    try {
      await this.db.transaction(async (tx) => {
        for (const batch of this.chunk(records)) {
          const keys = batch.map((record) => foldCase(record.conceptId))

          const existing = await tx
            .select({
              conceptIdLower: diseaseConcepts.conceptIdLower,
              mergeRef: diseaseConcepts.mergeRef,
            })
            .from(diseaseConcepts)
            .where(inArray(diseaseConcepts.conceptIdLower, keys))

          await tx.delete(diseaseRefs).where(inArray(diseaseRefs.conceptIdLower, keys))
          await tx.delete(diseaseConcepts).where(inArray(diseaseConcepts.conceptIdLower, keys))
          await this.insertRecords(tx, batch, readMergeRefs(existing))
        }
      })
    } catch (error) {
      throw new TransactionError('Failed to add source records', {
        records: records.length,
        error: errorMessage(error),
      })
    }
  }

  async deleteSource(sourceName: SourceName): Promise<number> {
    try {
      const removed = await this.db.transaction(
        async (tx) => (await this.deleteSourceRows(tx, sourceName)).size
      )
      this.logger.debug('Source records deleted', { sourceName, removed })
      return removed
    } catch (error) {
      throw new TransactionError(`Failed to delete source ${sourceName}`, {
        sourceName,
        error: errorMessage(error),
      })
    }
  }

  /**
   * Deletes and re-inserts one source in a single transaction
   */
  async replaceSource(sourceName: SourceName, records: SourceRecord[]): Promise<number> {
    this.validateSourceBatch(sourceName, records)

    try {
      const removed = await this.db.transaction(async (tx) => {
        const mergeRefs = await this.deleteSourceRows(tx, sourceName)
        for (const batch of this.chunk(records)) {
          await this.insertRecords(tx, batch, mergeRefs)
        }
        return mergeRefs.size
      })
      this.logger.debug('Source records replaced', {
        sourceName,
        removed,
        added: records.length,
      })
      return removed
    } catch (error) {
      throw new TransactionError(`Failed to replace source ${sourceName}`, {
        sourceName,
        records: records.length,
        error: errorMessage(error),
      })
    }
  }

  async addSourceMetadata(sourceName: SourceName, meta: SourceMeta): Promise<void> {
    const { eq } = this.operators

    try {
      await this.db.transaction(async (tx) => {
        await tx.delete(diseaseSources).where(eq(diseaseSources.sourceName, sourceName))
        await tx.insert(diseaseSources).values({
          sourceName,
          dataLicense: meta.dataLicense,
          dataLicenseUrl: meta.dataLicenseUrl,
          version: meta.version,
          dataUrl: meta.dataUrl,
          rdpUrl: meta.rdpUrl ?? null,
          nonCommercial: meta.dataLicenseAttributes.nonCommercial,
          attribution: meta.dataLicenseAttributes.attribution,
          shareAlike: meta.dataLicenseAttributes.shareAlike,
        })
      })
    } catch (error) {
      throw new TransactionError(`Failed to store metadata for ${sourceName}`, {
        sourceName,
        error: errorMessage(error),
      })
    }
  }

  async getSourceMetadata(sourceName: SourceName): Promise<SourceMeta | null> {
    try {
      const [row] = await this.db
        .select()
        .from(diseaseSources)
        .where(this.operators.eq(diseaseSources.sourceName, sourceName))
        .limit(1)
      if (!row) return null
      return {
        dataLicense: readString(row, 'dataLicense'),
        dataLicenseUrl: readString(row, 'dataLicenseUrl'),
        version: readString(row, 'version'),
        dataUrl: readString(row, 'dataUrl'),
        rdpUrl: readOptionalString(row, 'rdpUrl'),
        dataLicenseAttributes: {
          nonCommercial: readBoolean(row, 'nonCommercial'),
          attribution: readBoolean(row, 'attribution'),
          shareAlike: readBoolean(row, 'shareAlike'),
        },
      }
    } catch (error) {
      throw new QueryError(`Failed to read metadata for ${sourceName}`, {
        sourceName,
        error: errorMessage(error),
      })
    }
  }

  /**
   * Removes one source's concepts and their ref rows.
   *
   * @returns Merge refs of the removed rows, keyed by folded concept id
   */
  private async deleteSourceRows(
    tx: DrizzleDatabase,
    sourceName: SourceName
  ): Promise<Map<string, string | null>> {
    const { eq, inArray } = this.operators
    const rows = await tx
      .select({
        conceptIdLower: diseaseConcepts.conceptIdLower,
        mergeRef: diseaseConcepts.mergeRef,
      })
      .from(diseaseConcepts)
      .where(eq(diseaseConcepts.sourceName, sourceName))
    const mergeRefs = readMergeRefs(rows)

    for (const batch of this.chunk([...mergeRefs.keys()])) {
      await tx.delete(diseaseRefs).where(inArray(diseaseRefs.conceptIdLower, batch))
    }
    await tx.delete(diseaseConcepts).where(eq(diseaseConcepts.sourceName, sourceName))
    return mergeRefs
  }

  private async insertRecords(
    tx: DrizzleDatabase,
    records: SourceRecord[],
    mergeRefs: ReadonlyMap<string, string | null>
  ): Promise<void> {
    if (records.length === 0) return
    const stored = records.map((record) => this.toStoredRecord(record))
    await tx.insert(diseaseConcepts).values(
      stored.map((record) => ({
        conceptId: record.conceptId,
        conceptIdLower: foldCase(record.conceptId),
        sourceName: record.sourceName,
        label: record.label,
        aliases: record.aliases,
        xrefs: record.xrefs,
        associatedWith: record.associatedWith,
        pediatricDisease: record.pediatricDisease,
        oncologicDisease: record.oncologicDisease,
        mergeRef: mergeRefs.get(foldCase(record.conceptId)) ?? null,
      }))
    )

    const refs = stored.flatMap(refRows)
    if (refs.length > 0) {
      await tx.insert(diseaseRefs).values(refs)
    }
  }
}
