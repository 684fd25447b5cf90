export type { DiseaseStore, StoreOptions } from './types.js'

export {
  AdapterError,
  ConnectionError,
  QueryError,
  TransactionError,
  ValidationError,
} from './adapter-error.js'

export { BaseDiseaseStore } from './base-adapter.js'
export { MemoryDiseaseStore } from './memory/memory-store.js'
