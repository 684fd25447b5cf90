/**
 * Command line interface: load, rebuild, search, normalize
 * @module cli
 */

import { parseArgs } from 'node:util'
import { and, eq, inArray } from 'drizzle-orm'
import { drizzle } from 'drizzle-orm/node-postgres'
import pg from 'pg'
import { ConnectionError } from './adapters/adapter-error.js'
import { drizzleStore } from './adapters/drizzle/index.js'
import { MemoryDiseaseStore } from './adapters/memory/memory-store.js'
import type { DiseaseStore } from './adapters/types.js'
import { DiseaseNorm } from './builder/normalizer-builder.js'
import { ConfigValidationError, isLogLevel, loadConfig, type NormalizerConfig } from './config/config.js'
import type { DiseaseNormalizer } from './core/disease-normalizer.js'
import { SourceLoader } from './etl/source-loader.js'
import { errorMessage, InvalidParameterError } from './utils/errors.js'
import { createLeveledLogger, type Logger } from './utils/logger.js'

const USAGE = `Usage: disease-norm <command> [options]

Commands:
  load <file...>          Replace each file's source records (add --rebuild to regroup)
  rebuild                 Regroup all records and replace merged records
  search <query>          Best matches per source (--include / --exclude)
  normalize <query>       Resolve a query to one merged concept

Options:
  --db-url <url>          PostgreSQL connection string (default: DISEASE_NORM_DB_URL)
  --data <file>           Source file to load into the in-memory store first (repeatable)
  --include <sources>     Comma-separated sources to search
  --exclude <sources>     Comma-separated sources to skip
  --rebuild               Rebuild merges after load
  --log-level <level>     debug, info, warn, error or silent
  --help                  Show this message
`

/**
 * Output streams used by the CLI
 */
export interface CliIO {
  out(text: string): void
  err(text: string): void
}

/**
 * An open store and how to release it
 */
export interface StoreHandle {
  store: DiseaseStore
  close(): Promise<void>
}

export interface CliDependencies {
  openStore(config: NormalizerConfig, logger: Logger): Promise<StoreHandle>
  logger: Logger
}

async function openDefaultStore(
  config: NormalizerConfig,
  logger: Logger
): Promise<StoreHandle> {
  if (!config.databaseUrl) {
    return {
      store: new MemoryDiseaseStore({ batchSize: config.batchSize, logger }),
      close: async () => {},
    }
  }

  const pool = new pg.Pool({ connectionString: config.databaseUrl })
  try {
    const client = await pool.connect()
    client.release()
  } catch (error) {
    await pool.end()
    throw new ConnectionError('Failed to connect to database', {
      error: errorMessage(error),
    })
  }
  return {
    store: drizzleStore(drizzle(pool), { eq, and, inArray }, {
      batchSize: config.batchSize,
      logger,
    }),
    close: () => pool.end(),
  }
}

const defaultDependencies: CliDependencies = {
  openStore: openDefaultStore,
  logger: {
    debug: (message, context) => console.error(`[DEBUG] ${message}`, context ?? ''),
    info: (message, context) => console.error(`[INFO] ${message}`, context ?? ''),
    warn: (message, context) => console.error(`[WARN] ${message}`, context ?? ''),
    error: (message, context) => console.error(`[ERROR] ${message}`, context ?? ''),
  },
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'db-url': { type: 'string' },
      data: { type: 'string', multiple: true },
      include: { type: 'string' },
      exclude: { type: 'string' },
      rebuild: { type: 'boolean', default: false },
      'log-level': { type: 'string' },
      help: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  })
}

async function loadFiles(
  normalizer: DiseaseNormalizer,
  loader: SourceLoader,
  files: string[]
): Promise<Array<{ file: string; source: string; added: number; removed: number; skipped: number }>> {
  const summaries = []
  for (const file of files) {
    const loaded = await loader.loadFile(file)
    const result = await normalizer.ingest(loaded.sourceName, loaded.records, loaded.meta)
    summaries.push({
      file,
      source: loaded.sourceName,
      added: result.added,
      removed: result.removed,
      skipped: loaded.skipped,
    })
  }
  return summaries
}

/**
 * Runs one CLI invocation and returns the process exit code
 *
 * @example
 * ```typescript
 * const code = await runCli(['normalize', 'nsclc', '--data', 'ncit.json'], {
 *   out: (text) => process.stdout.write(text),
 *   err: (text) => process.stderr.write(text),
 * })
 * ```
 */
export async function runCli(
  argv: string[],
  io: CliIO,
  dependencies: CliDependencies = defaultDependencies
): Promise<number> {
  let handle: StoreHandle | undefined
  try {
    const { values, positionals } = parseCommandLine(argv)
    const [command, ...rest] = positionals
    if (values.help || !command) {
      io.out(USAGE)
      return values.help ? 0 : 1
    }

    const logLevel = values['log-level']
    if (logLevel !== undefined && !isLogLevel(logLevel)) {
      throw new InvalidParameterError('--log-level', logLevel, 'must be debug, info, warn, error or silent')
    }
    const config = loadConfig({ databaseUrl: values['db-url'], logLevel })
    const logger = createLeveledLogger(config.logLevel, dependencies.logger)

    handle = await dependencies.openStore(config, logger)
    const normalizer = DiseaseNorm.create()
      .storage(handle.store)
      .logger(dependencies.logger)
      .logLevel(config.logLevel)
      .build()
    const loader = new SourceLoader({ logger })

    const preload = values.data ?? []
    if (preload.length > 0) {
      await loadFiles(normalizer, loader, preload)
      if (command === 'search' || command === 'normalize') {
        await normalizer.rebuildMerges()
      }
    }

    switch (command) {
      case 'load': {
        if (rest.length === 0) {
          throw new InvalidParameterError('file', rest, 'at least one file is required')
        }
        const loaded = await loadFiles(normalizer, loader, rest)
        const rebuild = values.rebuild ? await normalizer.rebuildMerges() : undefined
        io.out(`${JSON.stringify({ loaded, rebuild }, null, 2)}\n`)
        return 0
      }
      case 'rebuild': {
        const result = await normalizer.rebuildMerges()
        io.out(`${JSON.stringify(result, null, 2)}\n`)
        return 0
      }
      case 'search': {
        const result = await normalizer.search(rest.join(' '), {
          include: values.include,
          exclude: values.exclude,
        })
        io.out(`${JSON.stringify(result, null, 2)}\n`)
        return 0
      }
      case 'normalize': {
        const result = await normalizer.normalize(rest.join(' '))
        io.out(`${JSON.stringify(result, null, 2)}\n`)
        return 0
      }
      default:
        io.err(`Unknown command '${command}'\n\n${USAGE}`)
        return 1
    }
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      io.err(`Invalid configuration:\n${error.getFormattedErrors()}\n`)
    } else {
      io.err(`Error: ${errorMessage(error)}\n`)
    }
    return 1
  } finally {
    await handle?.close()
  }
}
