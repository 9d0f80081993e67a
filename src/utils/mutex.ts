/**
 * In-process keyed locking
 *
 * Serializes work per key (one entity, one job) inside a single process.
 * Waiters are queued in arrival order; different keys never block each other.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex()
 * const snapshot = await mutex.withLock('user/alice', async () => {
 *   return await commitPatch()
 * })
 * ```
 */

/**
 * A held lock that can be released
 */
export interface MutexHandle {
  readonly key: string
  /** Release the lock. Releasing twice is a no-op. */
  release(): void
}

export class KeyedMutex {
  /** Tail of the wait chain for each locked key */
  private readonly tails = new Map<string, Promise<void>>()

  /**
   * Wait for every earlier holder of `key`, then take the lock
   */
  async acquire(key: string): Promise<MutexHandle> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let releaseNext: () => void = () => {}
    const current = new Promise<void>(resolve => {
      releaseNext = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous

    let released = false
    return {
      key,
      release: () => {
        if (released) return
        released = true
        if (this.tails.get(key) === tail) {
          this.tails.delete(key)
        }
        releaseNext()
      },
    }
  }

  /**
   * Execute a function while holding the lock of `key`
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const handle = await this.acquire(key)
    try {
      return await fn()
    } finally {
      handle.release()
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
