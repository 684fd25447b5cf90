import type { StoreOptions } from '../types.js'
import {
  DrizzleDiseaseStore,
  type DrizzleDatabase,
  type DrizzleOperators,
} from './drizzle-store.js'

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type DrizzleClient = any

/**
 * Creates a PostgreSQL disease store on a Drizzle database.
 *
 * @param db - Drizzle database instance
 * @param operators - Drizzle operators (eq, and, inArray)
 * @param options - Batch size and logger
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * import { and, eq, inArray } from 'drizzle-orm'
 * import pg from 'pg'
 *
 * const pool = new pg.Pool({ connectionString: process.env.DISEASE_NORM_DB_URL })
 * const store = drizzleStore(drizzle(pool), { eq, and, inArray })
 * const ids = await store.lookupByField('alias', 'nsclc')
 * ```
 */
export function drizzleStore(
  db: DrizzleClient,
  operators: DrizzleOperators,
  options: StoreOptions = {}
): DrizzleDiseaseStore {
  return new DrizzleDiseaseStore(db, operators, options)
}

export { DrizzleDiseaseStore }
export type { DrizzleDatabase, DrizzleOperators }
export {
  diseaseConcepts,
  diseaseRefs,
  diseaseMerged,
  diseaseSources,
} from './schema.js'
