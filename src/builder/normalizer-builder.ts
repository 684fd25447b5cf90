import type { DiseaseStore } from '../adapters/types.js'
import { DiseaseNormalizer } from '../core/disease-normalizer.js'
import { NotConfiguredError, requireNonNull, requireOneOf } from '../utils/errors.js'
import {
  createLeveledLogger,
  defaultLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from '../utils/logger.js'

/**
 * Fluent builder for configuring and creating a DiseaseNormalizer instance.
 *
 * @example
 * ```typescript
 * const normalizer = DiseaseNorm.create()
 *   .storage(new MemoryDiseaseStore())
 *   .logLevel('warn')
 *   .build()
 * ```
 */
export class NormalizerBuilder {
  private diseaseStore?: DiseaseStore
  private baseLogger: Logger = defaultLogger
  private level: LogLevel = 'info'

  /**
   * Configure the storage backend.
   *
   * @param store - Memory or Drizzle store
   * @returns This builder for chaining
   */
  storage(store: DiseaseStore): this {
    this.diseaseStore = requireNonNull(store, 'store')
    return this
  }

  /**
   * Send log output to a custom logger instead of the console.
   *
   * @returns This builder for chaining
   */
  logger(logger: Logger): this {
    this.baseLogger = requireNonNull(logger, 'logger')
    return this
  }

  /**
   * Drop log messages below `level`. Defaults to `info`.
   *
   * @returns This builder for chaining
   * @throws {InvalidParameterError} If `level` is not a known log level
   */
  logLevel(level: LogLevel): this {
    this.level = requireOneOf(level, LOG_LEVELS, 'logLevel')
    return this
  }

  /**
   * Build the normalizer.
   *
   * @throws {NotConfiguredError} If no storage was configured
   */
  build(): DiseaseNormalizer {
    if (!this.diseaseStore) {
      throw new NotConfiguredError(
        'storage',
        'Call .storage(store) with a MemoryDiseaseStore or DrizzleDiseaseStore before .build().'
      )
    }
    return new DiseaseNormalizer(
      this.diseaseStore,
      createLeveledLogger(this.level, this.baseLogger)
    )
  }
}

/**
 * Main entry point.
 *
 * @example
 * ```typescript
 * import { DiseaseNorm, MemoryDiseaseStore } from 'disease-concept-normalizer'
 *
 * const normalizer = DiseaseNorm.create().storage(new MemoryDiseaseStore()).build()
 * ```
 */
export const DiseaseNorm = {
  /**
   * Create a new normalizer builder.
   */
  create(): NormalizerBuilder {
    return new NormalizerBuilder()
  },
}
