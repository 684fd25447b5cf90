// Configuration loading and validation for the normalizer
import { z, type ZodError } from 'zod'
import { ConfigurationError } from '../utils/errors.js'
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js'

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent'])

export const NormalizerConfigSchema = z.object({
  /** PostgreSQL connection string; the memory store is used when absent */
  databaseUrl: z
    .string()
    .url()
    .refine((url) => /^postgres(ql)?:\/\//.test(url), {
      message: 'must be a postgres:// or postgresql:// URL',
    })
    .optional(),
  logLevel: LogLevelSchema.default('info'),
  /** Rows written per insert statement */
  batchSize: z.coerce.number().int().positive().max(10_000).default(500),
})

export type NormalizerConfig = z.infer<typeof NormalizerConfigSchema>

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: ZodError['errors']
  ) {
    super(message, { fields: errors.map((err) => err.path.join('.')) })
    this.name = 'ConfigValidationError'
  }

  /**
   * Get a formatted string of all validation errors
   */
  getFormattedErrors(): string {
    return this.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n')
  }
}

/**
 * Build raw configuration from environment variables.
 * Empty variables count as unset.
 */
function buildRawConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    databaseUrl: env.DISEASE_NORM_DB_URL || undefined,
    logLevel: env.DISEASE_NORM_LOG_LEVEL?.toLowerCase() || undefined,
    batchSize: env.DISEASE_NORM_BATCH_SIZE || undefined,
  }
}

/**
 * Load and validate configuration. Explicit overrides win over the
 * environment.
 *
 * @throws {ConfigValidationError} When configuration is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig({ logLevel: 'debug' })
 * config.batchSize // 500 unless DISEASE_NORM_BATCH_SIZE is set
 * ```
 */
export function loadConfig(
  overrides: Partial<NormalizerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): NormalizerConfig {
  const merged = buildRawConfig(env)
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value
  }

  const result = NormalizerConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration:\n${result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n')}`,
      result.error.errors
    )
  }
  return result.data
}

/**
 * Type guard for log level strings, e.g. from a CLI flag
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}
