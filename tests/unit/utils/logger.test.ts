import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createLeveledLogger,
  createPrefixedLogger,
  createSilentLogger,
  defaultLogger,
  type Logger,
} from '../../../src/utils/logger.js'

function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes to the console by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    defaultLogger.info('Merge rebuild complete', { groups: 4 })
    defaultLogger.warn('Query contains non-breaking space characters')

    expect(log).toHaveBeenCalledWith('[INFO] Merge rebuild complete', { groups: 4 })
    expect(warn).toHaveBeenCalledWith('[WARN] Query contains non-breaking space characters', '')
  })

  it('prefixes messages with the component name', () => {
    const base = createMockLogger()
    createPrefixedLogger('rebuild', base).info('done', { groups: 1 })

    expect(base.info).toHaveBeenCalledWith('[rebuild] done', { groups: 1 })
  })

  it('drops messages below the configured level', () => {
    const base = createMockLogger()
    const logger = createLeveledLogger('warn', base)

    logger.debug('debug')
    logger.info('info')
    logger.warn('warn')
    logger.error('error')

    expect(base.debug).not.toHaveBeenCalled()
    expect(base.info).not.toHaveBeenCalled()
    expect(base.warn).toHaveBeenCalledWith('warn', undefined)
    expect(base.error).toHaveBeenCalledWith('error', undefined)
  })

  it('drops everything when silent', () => {
    const base = createMockLogger()
    createLeveledLogger('silent', base).error('error')

    expect(base.error).not.toHaveBeenCalled()
  })

  it('provides a no-op logger', () => {
    const logger = createSilentLogger()
    expect(() => logger.error('ignored', { reason: 'test' })).not.toThrow()
  })
})
