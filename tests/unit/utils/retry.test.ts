/**
 * Retry Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { calculateDelay, isRetryableError, withRetry } from '../../../src/utils/retry'
import { CancelledError, ValidationError, VersionConflictError } from '../../../src/errors'

const noJitter = { jitter: false, baseDelay: 10, multiplier: 2, maxDelay: 1000 }

function conflict(): VersionConflictError {
  return new VersionConflictError(1, 2, { entityType: 'user', key: 'alice' })
}

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async () => 'done')

    await expect(withRetry(fn)).resolves.toBe('done')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('should retry version conflicts with exponential backoff', async () => {
    const delays: number[] = []
    let calls = 0
    const fn = async (): Promise<number> => {
      calls++
      if (calls < 3) throw conflict()
      return calls
    }

    const result = await withRetry(fn, {
      ...noJitter,
      _delayFn: async ms => {
        delays.push(ms)
      },
    })

    expect(result).toBe(3)
    expect(delays).toEqual([10, 20])
  })

  it('should not retry other errors', async () => {
    const fn = vi.fn(async () => {
      throw new ValidationError('bad patch')
    })

    await expect(withRetry(fn, { _delayFn: async () => {} })).rejects.toThrow('bad patch')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('should rethrow the last error once retries are exhausted', async () => {
    const fn = vi.fn(async () => {
      throw conflict()
    })

    await expect(withRetry(fn, { maxRetries: 2, _delayFn: async () => {} })).rejects.toThrow(VersionConflictError)
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('should stop when onRetry returns false', async () => {
    const fn = vi.fn(async () => {
      throw conflict()
    })
    const onRetry = vi.fn(() => false)

    await expect(withRetry(fn, { onRetry, _delayFn: async () => {} })).rejects.toThrow(VersionConflictError)
    expect(fn).toHaveBeenCalledTimes(1)
    expect(onRetry).toHaveBeenCalledTimes(1)
  })

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = vi.fn(async () => 'done')

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toThrow(CancelledError)
    expect(fn).not.toHaveBeenCalled()
  })

  it('should stop retrying once the signal aborts', async () => {
    const controller = new AbortController()
    const fn = vi.fn(async () => {
      throw conflict()
    })

    const run = withRetry(fn, {
      signal: controller.signal,
      _delayFn: async () => {
        controller.abort()
      },
    })

    await expect(run).rejects.toThrow('Operation was cancelled')
    expect(fn).toHaveBeenCalledTimes(1)
  })
})

describe('calculateDelay', () => {
  it('should grow exponentially up to the maximum', () => {
    const config = { ...noJitter, baseDelay: 25, maxDelay: 60, jitterFactor: 0.5 }
    expect(calculateDelay(1, config)).toBe(25)
    expect(calculateDelay(2, config)).toBe(50)
    expect(calculateDelay(3, config)).toBe(60)
  })

  it('should keep jittered delays within range', () => {
    const config = { baseDelay: 100, maxDelay: 1000, multiplier: 2, jitter: true, jitterFactor: 0.5 }
    for (let i = 0; i < 20; i++) {
      const delay = calculateDelay(1, config)
      expect(delay).toBeGreaterThanOrEqual(50)
      expect(delay).toBeLessThanOrEqual(150)
    }
  })
})

describe('isRetryableError', () => {
  it('should retry version conflicts and errors flagged retryable', () => {
    expect(isRetryableError(conflict())).toBe(true)
    expect(isRetryableError(Object.assign(new Error('busy'), { retryable: true }))).toBe(true)
  })

  it('should not retry anything else', () => {
    expect(isRetryableError(new Error('boom'))).toBe(false)
    expect(isRetryableError(new ValidationError('bad'))).toBe(false)
    expect(isRetryableError('conflict')).toBe(false)
  })
})
