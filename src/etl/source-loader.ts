/**
 * Reads per-source JSON files and turns them into source records
 * @module etl/source-loader
 */

import { readFile } from 'node:fs/promises'
import type { SourceRecord } from '../types/record.js'
import { parseSourceName, type SourceMeta, type SourceName } from '../types/source.js'
import { errorMessage } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { foldCase } from '../utils/strings.js'
import { SourceFileError, TransformError } from './etl-error.js'
import { SourceFileSchema, type SourceFile } from './source-file.js'
import { transformerFor } from './transformers.js'

/**
 * Records and metadata ready to be handed to `DiseaseNormalizer.ingest`
 */
export interface LoadedSource {
  sourceName: SourceName
  version: string
  records: SourceRecord[]
  meta: SourceMeta
  /** Terms that could not be transformed or repeated an earlier id */
  skipped: number
}

export interface SourceLoaderOptions {
  logger?: Logger
}

/**
 * SourceLoader - validates a source file and runs its transformer
 *
 * @example
 * ```typescript
 * const loader = new SourceLoader({ logger })
 * const loaded = await loader.loadFile('data/do.json')
 * await normalizer.ingest(loaded.sourceName, loaded.records, loaded.meta)
 * ```
 */
export class SourceLoader {
  private readonly logger: Logger

  constructor(options: SourceLoaderOptions = {}) {
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * @throws {SourceFileError} If the file cannot be read or parsed, or names
   * an unknown source
   */
  async loadFile(filePath: string): Promise<LoadedSource> {
    let text: string
    try {
      text = await readFile(filePath, 'utf8')
    } catch (error) {
      throw new SourceFileError(filePath, errorMessage(error))
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      throw new SourceFileError(filePath, `invalid JSON: ${errorMessage(error)}`)
    }

    return this.load(json, filePath)
  }

  /**
   * Same as {@link loadFile} for content that is already parsed
   */
  load(content: unknown, origin = '<memory>'): LoadedSource {
    const result = SourceFileSchema.safeParse(content)
    if (!result.success) {
      throw new SourceFileError(
        origin,
        result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
      )
    }
    return this.transform(result.data, origin)
  }

  private transform(file: SourceFile, origin: string): LoadedSource {
    const sourceName = parseSourceName(file.source)
    if (!sourceName) {
      throw new SourceFileError(origin, `unknown source '${file.source}'`)
    }

    const transformer = transformerFor(sourceName, { logger: this.logger })
    const records: SourceRecord[] = []
    const seen = new Set<string>()
    let skipped = 0

    for (const term of file.terms) {
      let record: SourceRecord
      try {
        record = transformer.transform(term)
      } catch (error) {
        if (!(error instanceof TransformError)) throw error
        this.logger.warn('Term skipped', { origin, termId: term.id, reason: error.message })
        skipped++
        continue
      }

      const key = foldCase(record.conceptId)
      if (seen.has(key)) {
        this.logger.warn('Duplicate term skipped', { origin, conceptId: record.conceptId })
        skipped++
        continue
      }
      seen.add(key)
      records.push(record)
    }

    this.logger.info(`Loaded ${sourceName} ${file.version}`, {
      origin,
      records: records.length,
      skipped,
    })

    return {
      sourceName,
      version: file.version,
      records,
      meta: transformer.meta(file.version),
      skipped,
    }
  }
}
