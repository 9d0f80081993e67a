/**
 * Bounded Parallel Mapping Tests
 */

import { describe, it, expect } from 'vitest'
import { mapWithConcurrency } from '../../../src/utils/concurrency'

function tick(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 1))
}

describe('mapWithConcurrency', () => {
  it('should keep input order and respect the limit', async () => {
    let inFlight = 0
    let peak = 0

    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n, index) => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await tick()
      inFlight--
      return `${index}:${n * 2}`
    })

    expect(results).toEqual(['0:2', '1:4', '2:6', '3:8', '4:10', '5:12'])
    expect(peak).toBe(2)
  })

  it('should return an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([])
  })

  it('should reject with the first failure', async () => {
    const run = mapWithConcurrency(['a', 'b', 'c'], 3, async item => {
      if (item === 'b') throw new Error('lookup failed for b')
      return item
    })

    await expect(run).rejects.toThrow('lookup failed for b')
  })
})
