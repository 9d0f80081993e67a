/**
 * Value comparison utilities
 *
 * Structural equality used by the change recorder when a field descriptor
 * declares no comparator of its own.
 */

/**
 * Deep equality check for two values
 *
 * Handles:
 * - Primitives (strict equality)
 * - null/undefined (treated as equal)
 * - Dates (compared by timestamp)
 * - Arrays (element-wise comparison, order matters)
 * - Objects (key-value comparison)
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [2, 1]) // false
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || a === undefined) return b === null || b === undefined

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isPlainRecord(a) && isPlainRecord(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => Object.prototype.hasOwnProperty.call(b, k) && deepEqual(a[k], b[k]))
  }

  return false
}

/**
 * Narrow a value to a non-array object
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

/**
 * Round a version number to one decimal, avoiding 0.1 + 0.2 drift
 */
export function roundVersion(value: number): number {
  return Math.round(value * 10) / 10
}
