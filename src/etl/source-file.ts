/**
 * Shape of the per-source JSON files accepted by the loader
 * @module etl/source-file
 */

import { z } from 'zod'

/**
 * One term as extracted from a source ontology.
 * `references` holds CURIEs as the source writes them, e.g. `NCI:C2926`.
 */
export const ExtractedTermSchema = z.object({
  id: z.string().min(1),
  label: z.string().nullable().optional(),
  synonyms: z.array(z.string()).default([]),
  references: z.array(z.string()).default([]),
  pediatricDisease: z.boolean().nullable().optional(),
  oncologicDisease: z.boolean().nullable().optional(),
})

export const SourceFileSchema = z.object({
  source: z.string().min(1),
  version: z.string().min(1),
  terms: z.array(ExtractedTermSchema),
})

export type ExtractedTerm = z.infer<typeof ExtractedTermSchema>
export type SourceFile = z.infer<typeof SourceFileSchema>
