/**
 * Logger utility for row-assets
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger so that library use stays silent;
 * process wiring switches to a console logger with a level.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/** Log levels, lowest first */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages below `level` are dropped
 *
 * @example
 * ```typescript
 * setLogger(createLevelLogger('warn'))
 * logger.info('dropped')
 * logger.warn('printed')
 * ```
 */
export function createLevelLogger(level: LogLevel, target: Logger = consoleLogger): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (l: LogLevel): boolean => LOG_LEVELS.indexOf(l) >= threshold

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) target.debug(message, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) target.info(message, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) target.warn(message, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (enabled('error')) target.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @param l - Logger implementation to use
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * // Enable console logging for development
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}
