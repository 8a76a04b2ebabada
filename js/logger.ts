import pino from 'pino'
import type { Logger, LoggerOptions } from 'pino'
import { loadEnvConfig } from './config'

/**
 * Logger setup for linkscan
 *
 * Logs go to stderr so stdout carries nothing but scan results. Entries the
 * walker skips and candidates that fail to resolve are logged at debug, so
 * they stay invisible unless LINKSCAN_LOG_LEVEL asks for them.
 */

function createLoggerOptions(): LoggerOptions {
  const cfg = loadEnvConfig()

  const baseOptions: LoggerOptions = {
    level: cfg.LINKSCAN_LOG_LEVEL,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  }

  // Test environment: minimal output
  if (cfg.NODE_ENV === 'test') {
    return { ...baseOptions, level: 'warn' }
  }

  return baseOptions
}

/**
 * Main logger instance
 */
export const logger: Logger = pino(createLoggerOptions(), pino.destination(2))

/**
 * Create a module-specific logger
 *
 * @example
 * ```ts
 * const log = createModuleLogger('walker')
 * log.debug({ path }, 'skipped unreadable directory')
 * ```
 */
export function createModuleLogger(moduleName: string): Logger {
  return logger.child({ module: moduleName })
}

/**
 * Time an operation and log its duration at debug level when it completes
 */
export function startTimer(
  log: Logger,
  operation: string
): (result?: Record<string, unknown>) => number {
  const start = performance.now()
  return (result = {}) => {
    const durationMs = performance.now() - start
    log.debug({ operation, durationMs: Math.round(durationMs), ...result }, `${operation} completed`)
    return durationMs
  }
}
