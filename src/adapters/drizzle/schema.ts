/**
 * PostgreSQL tables used by the Drizzle disease store
 * @module adapters/drizzle/schema
 */

import { boolean, index, pgTable, serial, text } from 'drizzle-orm/pg-core'

/**
 * One row per ingested source record. `concept_id_lower` carries the
 * case-insensitive identity; set fields are stored as written.
 */
export const diseaseConcepts = pgTable(
  'disease_concepts',
  {
    conceptId: text('concept_id').primaryKey(),
    conceptIdLower: text('concept_id_lower').notNull().unique(),
    sourceName: text('source_name').notNull(),
    label: text('label'),
    aliases: text('aliases').array().notNull(),
    xrefs: text('xrefs').array().notNull(),
    associatedWith: text('associated_with').array().notNull(),
    pediatricDisease: boolean('pediatric_disease'),
    oncologicDisease: boolean('oncologic_disease'),
    mergeRef: text('merge_ref'),
  },
  (table) => ({
    sourceIdx: index('idx_disease_concepts_source').on(table.sourceName),
    mergeRefIdx: index('idx_disease_concepts_merge_ref').on(table.mergeRef),
  })
)

/**
 * Lookup index: one row per label, alias, xref or associated_with value
 */
export const diseaseRefs = pgTable(
  'disease_refs',
  {
    id: serial('id').primaryKey(),
    conceptId: text('concept_id').notNull(),
    conceptIdLower: text('concept_id_lower').notNull(),
    refType: text('ref_type').notNull(),
    value: text('value').notNull(),
    valueLower: text('value_lower').notNull(),
  },
  (table) => ({
    lookupIdx: index('idx_disease_refs_lookup').on(table.refType, table.valueLower),
    conceptIdx: index('idx_disease_refs_concept').on(table.conceptIdLower),
  })
)

/**
 * Merged records written by the last committed rebuild
 */
export const diseaseMerged = pgTable('disease_merged', {
  conceptId: text('concept_id').primaryKey(),
  conceptIdLower: text('concept_id_lower').notNull().unique(),
  label: text('label').notNull(),
  aliases: text('aliases').array().notNull(),
  xrefs: text('xrefs').array().notNull(),
  associatedWith: text('associated_with').array().notNull(),
  pediatricDisease: boolean('pediatric_disease'),
  oncologicDisease: boolean('oncologic_disease'),
})

/**
 * Licensing and version metadata, one row per source
 */
export const diseaseSources = pgTable('disease_sources', {
  sourceName: text('source_name').primaryKey(),
  dataLicense: text('data_license').notNull(),
  dataLicenseUrl: text('data_license_url').notNull(),
  version: text('version').notNull(),
  dataUrl: text('data_url').notNull(),
  rdpUrl: text('rdp_url'),
  nonCommercial: boolean('data_license_nc').notNull(),
  attribution: boolean('data_license_attr').notNull(),
  shareAlike: boolean('data_license_sa').notNull(),
})
