/**
 * In-process async mutex keyed by string.
 *
 * The layer cache takes a key's lock while publishing an entry so that two
 * builds in the same process never stage the same layer at once; the stats
 * store takes one per file while merging its updates.
 */
export class KeyLock {
  private readonly held = new Map<string, Promise<void>>()

  /**
   * Acquire the exclusive lock on `key`.
   * Returns an idempotent release function.
   */
  async acquire(key: string): Promise<() => void> {
    let current = this.held.get(key)
    while (current) {
      await current
      current = this.held.get(key)
    }

    let resolveDone = () => {/* replaced below */}
    const done = new Promise<void>(resolve => {
      resolveDone = resolve
    })
    this.held.set(key, done)

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      this.held.delete(key)
      resolveDone()
    }
  }

  /** Run `fn` while holding the lock on `key`. */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key)
  }
}
