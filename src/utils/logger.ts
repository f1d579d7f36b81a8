/**
 * Logger implementations
 * @module utils/logger
 */

import type { Logger } from '../lookup/types.js'

/**
 * Console logger with level-prefixed lines
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
 * Creates a logger that prefixes messages, e.g. with a provider name
 */
export function createPrefixedLogger(
  prefix: string,
  baseLogger: Logger
): Logger {
  const tag = `[${prefix}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${tag} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${tag} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${tag} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${tag} ${message}`, context),
  }
}
