/**
 * Retry with Exponential Backoff
 *
 * Retries an operation after transient failures such as a commit rejected
 * by optimistic concurrency control.
 */

import { getSecureRandom } from './random'
import { CancelledError, isVersionConflictError } from '../errors'
import {
  DEFAULT_MAX_COMMIT_RETRIES,
  DEFAULT_RETRY_BASE_DELAY,
  DEFAULT_RETRY_MAX_DELAY,
  DEFAULT_RETRY_MULTIPLIER,
  DEFAULT_RETRY_JITTER_FACTOR,
} from '../constants'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Information passed to the onRetry callback
 */
export interface RetryInfo {
  /** The retry attempt number (1-indexed, so first retry is 1) */
  attempt: number
  error: Error
  /** The delay in milliseconds before this retry */
  delay: number
}

/**
 * Configuration options for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number | undefined
  /** Base delay in milliseconds (default: 25) */
  baseDelay?: number | undefined
  /** Maximum delay in milliseconds (default: 1000) */
  maxDelay?: number | undefined
  /** Multiplier for exponential backoff (default: 2) */
  multiplier?: number | undefined
  /** Whether to add random jitter to delays (default: true) */
  jitter?: boolean | undefined
  /** Jitter factor (default: 0.5, meaning +/- 50%) */
  jitterFactor?: number | undefined
  /** Custom predicate to determine if error is retryable */
  isRetryable?: ((error: Error) => boolean) | undefined
  /** Called before each retry attempt. Return false to abort retries. */
  onRetry?: ((info: RetryInfo) => boolean | void) | undefined
  /** Cancels pending retries */
  signal?: AbortSignal | undefined
  /** Internal: custom delay function for testing */
  _delayFn?: ((ms: number) => Promise<void>) | undefined
}

export const DEFAULT_RETRY_CONFIG = {
  maxRetries: DEFAULT_MAX_COMMIT_RETRIES,
  baseDelay: DEFAULT_RETRY_BASE_DELAY,
  maxDelay: DEFAULT_RETRY_MAX_DELAY,
  jitter: true,
  multiplier: DEFAULT_RETRY_MULTIPLIER,
  jitterFactor: DEFAULT_RETRY_JITTER_FACTOR,
} as const

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Version conflicts, and any error flagged `retryable: true`
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false
  }
  if (isVersionConflictError(error)) {
    return true
  }
  return 'retryable' in error && error.retryable === true
}

// =============================================================================
// DELAY UTILITIES
// =============================================================================

async function defaultDelay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Delay of a given retry attempt with exponential backoff
 */
export function calculateDelay(
  attempt: number,
  config: {
    baseDelay: number
    maxDelay: number
    multiplier: number
    jitter: boolean
    jitterFactor: number
  }
): number {
  let delay = config.baseDelay * Math.pow(config.multiplier, attempt - 1)

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor
    // Random value between -jitterRange and +jitterRange
    delay = delay + (getSecureRandom() * 2 - 1) * jitterRange
  }

  delay = Math.max(0, delay)
  delay = Math.min(delay, config.maxDelay)

  return Math.floor(delay)
}

// =============================================================================
// MAIN RETRY FUNCTION
// =============================================================================

/**
 * Run `fn`, retrying retryable failures with exponential backoff
 *
 * @returns The result of the function, or throws the last error once retries
 * are exhausted
 *
 * @example
 * ```typescript
 * const snapshot = await withRetry(() => commitPatch(), {
 *   maxRetries: 5,
 *   onRetry: ({ attempt, error }) => {
 *     logger.debug(`Retry ${attempt} after error: ${error.message}`)
 *   },
 * })
 * ```
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  config: RetryConfig = {}
): Promise<T> {
  const maxRetries = config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries
  const backoff = {
    baseDelay: config.baseDelay ?? DEFAULT_RETRY_CONFIG.baseDelay,
    maxDelay: config.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier: config.multiplier ?? DEFAULT_RETRY_CONFIG.multiplier,
    jitter: config.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
    jitterFactor: config.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  }
  const isRetryableFn = config.isRetryable ?? isRetryableError
  const delayFn = config._delayFn ?? defaultDelay

  let attempts = 0

  if (config.signal?.aborted) {
    throw new CancelledError()
  }

  while (true) {
    attempts++

    try {
      return await Promise.resolve(fn())
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))

      if (!isRetryableFn(err) || attempts > maxRetries) {
        throw err
      }

      const delay = calculateDelay(attempts, backoff)

      // onRetry returning false stops retrying
      if (config.onRetry?.({ attempt: attempts, error: err, delay }) === false) {
        throw err
      }

      if (config.signal?.aborted) {
        throw new CancelledError()
      }

      await delayFn(delay)

      if (config.signal?.aborted) {
        throw new CancelledError()
      }
    }
  }
}
