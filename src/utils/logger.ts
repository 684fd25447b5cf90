/**
 * Logging primitives shared by every component
 * @module utils/logger
 */

/**
 * Minimal structured logger accepted throughout the library
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(
  componentName: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${componentName}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}

/**
 * Creates a logger that drops every message below `level`
 */
export function createLeveledLogger(
  level: LogLevel,
  baseLogger: Logger = defaultLogger
): Logger {
  const threshold = LEVEL_RANK[level]
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>) =>
    LEVEL_RANK[messageLevel] >= threshold

  return {
    debug: (message, context) => {
      if (enabled('debug')) baseLogger.debug(message, context)
    },
    info: (message, context) => {
      if (enabled('info')) baseLogger.info(message, context)
    },
    warn: (message, context) => {
      if (enabled('warn')) baseLogger.warn(message, context)
    },
    error: (message, context) => {
      if (enabled('error')) baseLogger.error(message, context)
    },
  }
}
