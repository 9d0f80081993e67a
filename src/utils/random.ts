/**
 * Random utilities backed by node:crypto
 *
 * Never use Math.random() for identifiers or backoff jitter.
 *
 * @module utils/random
 */

import { randomBytes, randomUUID } from 'node:crypto'

function getRandomBytes(length: number): Uint8Array {
  return randomBytes(length)
}

/**
 * Random number in range [0, 1) built from 53 random bits
 */
export function getSecureRandom(): number {
  const bytes = getRandomBytes(7)
  // 5 bits from the first byte, 8 from each of the other six
  let value = 0
  bytes.forEach((byte, i) => {
    value = value * 0x100 + (i === 0 ? byte & 0x1f : byte)
  })
  return value / 0x20000000000000
}

/**
 * UUID v4 used as entity id
 */
export function getUUID(): string {
  return randomUUID()
}
