/**
 * Engine Configuration
 *
 * Resolves engine settings from explicit options or from `CATALOG_*`
 * environment variables. Unset values fall back to the defaults in
 * `src/constants.ts`.
 *
 * @module config
 */

import {
  DEFAULT_CSV_DELIMITER,
  DEFAULT_MAX_COMMIT_RETRIES,
  DEFAULT_RETRY_BASE_DELAY,
  DEFAULT_RETRY_MAX_DELAY,
  DEFAULT_SESSION_TIMEOUT_MS,
  DEFAULT_VALIDATION_CONCURRENCY,
  DEFAULT_VALUE_SEPARATOR,
} from '../constants'
import { ConfigurationError } from '../errors'

// =============================================================================
// Types
// =============================================================================

export interface EngineConfig {
  /** Primary CSV field delimiter */
  readonly csvDelimiter: string
  /** Separator of multi-valued CSV cells */
  readonly valueSeparator: string
  /** Retries after a commit-time version conflict */
  readonly maxCommitRetries: number
  readonly retryBaseDelayMs: number
  readonly retryMaxDelayMs: number
  /** Window for consolidating follow-up patches of one caller */
  readonly sessionTimeoutMs: number
  /** CSV rows validated concurrently */
  readonly validationConcurrency: number
  /** Serialize mutations of one entity inside this process */
  readonly serializeWrites: boolean
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  csvDelimiter: DEFAULT_CSV_DELIMITER,
  valueSeparator: DEFAULT_VALUE_SEPARATOR,
  maxCommitRetries: DEFAULT_MAX_COMMIT_RETRIES,
  retryBaseDelayMs: DEFAULT_RETRY_BASE_DELAY,
  retryMaxDelayMs: DEFAULT_RETRY_MAX_DELAY,
  sessionTimeoutMs: DEFAULT_SESSION_TIMEOUT_MS,
  validationConcurrency: DEFAULT_VALIDATION_CONCURRENCY,
  serializeWrites: true,
})

/** Environment variable of each setting */
export const CONFIG_ENV_VARS = {
  csvDelimiter: 'CATALOG_CSV_DELIMITER',
  valueSeparator: 'CATALOG_VALUE_SEPARATOR',
  maxCommitRetries: 'CATALOG_MAX_COMMIT_RETRIES',
  retryBaseDelayMs: 'CATALOG_RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'CATALOG_RETRY_MAX_DELAY_MS',
  sessionTimeoutMs: 'CATALOG_SESSION_TIMEOUT_MS',
  validationConcurrency: 'CATALOG_VALIDATION_CONCURRENCY',
  serializeWrites: 'CATALOG_SERIALIZE_WRITES',
} as const satisfies Record<keyof EngineConfig, string>

// =============================================================================
// Resolution
// =============================================================================

function assertNonNegativeInteger(key: keyof EngineConfig, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer`, key, value)
  }
}

function assertSeparator(key: keyof EngineConfig, value: string): void {
  if (value.length !== 1 || value === '"' || value === '\n' || value === '\r') {
    throw new ConfigurationError(`${key} must be a single character other than a quote or line break`, key, value)
  }
}

/**
 * Merge `options` over the defaults and validate the result
 *
 * @throws ConfigurationError on an invalid value
 */
export function resolveConfig(options: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...stripUndefined(options) }

  assertSeparator('csvDelimiter', config.csvDelimiter)
  assertSeparator('valueSeparator', config.valueSeparator)
  if (config.csvDelimiter === config.valueSeparator) {
    throw new ConfigurationError('valueSeparator must differ from csvDelimiter', 'valueSeparator', config.valueSeparator)
  }

  assertNonNegativeInteger('maxCommitRetries', config.maxCommitRetries)
  assertNonNegativeInteger('retryBaseDelayMs', config.retryBaseDelayMs)
  assertNonNegativeInteger('retryMaxDelayMs', config.retryMaxDelayMs)
  assertNonNegativeInteger('sessionTimeoutMs', config.sessionTimeoutMs)
  assertNonNegativeInteger('validationConcurrency', config.validationConcurrency)
  if (config.validationConcurrency < 1) {
    throw new ConfigurationError('validationConcurrency must be at least 1', 'validationConcurrency', config.validationConcurrency)
  }

  return Object.freeze(config)
}

function stripUndefined(options: Partial<EngineConfig>): Partial<EngineConfig> {
  const result: Partial<EngineConfig> = {}
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(result, { [key]: value })
  }
  return result
}

// =============================================================================
// Environment
// =============================================================================

function parseInteger(key: keyof EngineConfig, raw: string): number {
  const value = Number(raw.trim())
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigurationError(`${CONFIG_ENV_VARS[key]} must be an integer`, key, raw)
  }
  return value
}

function parseBoolean(key: keyof EngineConfig, raw: string): boolean {
  const value = raw.trim().toLowerCase()
  if (value === 'true' || value === '1' || value === 'yes') return true
  if (value === 'false' || value === '0' || value === 'no') return false
  throw new ConfigurationError(`${CONFIG_ENV_VARS[key]} must be a boolean`, key, raw)
}

/**
 * Read settings from `CATALOG_*` variables
 *
 * @example
 * ```typescript
 * // CATALOG_MAX_COMMIT_RETRIES=5 CATALOG_SERIALIZE_WRITES=false
 * const config = loadConfigFromEnv(process.env)
 * ```
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const options: Partial<EngineConfig> = {}
  const read = (key: keyof EngineConfig): string | undefined => env[CONFIG_ENV_VARS[key]]

  const csvDelimiter = read('csvDelimiter')
  if (csvDelimiter !== undefined) Object.assign(options, { csvDelimiter })
  const valueSeparator = read('valueSeparator')
  if (valueSeparator !== undefined) Object.assign(options, { valueSeparator })

  const integerKeys = [
    'maxCommitRetries',
    'retryBaseDelayMs',
    'retryMaxDelayMs',
    'sessionTimeoutMs',
    'validationConcurrency',
  ] as const
  for (const key of integerKeys) {
    const raw = read(key)
    if (raw !== undefined) Object.assign(options, { [key]: parseInteger(key, raw) })
  }

  const serializeWrites = read('serializeWrites')
  if (serializeWrites !== undefined) {
    Object.assign(options, { serializeWrites: parseBoolean('serializeWrites', serializeWrites) })
  }

  return resolveConfig({ ...options, ...stripUndefined(overrides) })
}
