/**
 * Logger utility
 *
 * Pluggable logging interface shared by the engine, the CSV pipeline and
 * the job runner. Defaults to a noop logger; embedders switch to the console
 * logger (or their own) with setLogger().
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

/**
 * Console logger implementation
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
 * Noop logger implementation (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

let current: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  current = l
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  return current
}

/**
 * Logger that prefixes every message with a component scope, e.g.
 * `[jobs] job 86Rf07 completed`. Resolves the global logger on every call so
 * setLogger() takes effect for loggers created at module load.
 */
export function scopedLogger(scope: string): Logger {
  const prefix = `[${scope}] `
  return {
    debug: (message, ...args) => current.debug(prefix + message, ...args),
    info: (message, ...args) => current.info(prefix + message, ...args),
    warn: (message, ...args) => current.warn(prefix + message, ...args),
    error: (message, error, ...args) => current.error(prefix + message, error, ...args),
  }
}
