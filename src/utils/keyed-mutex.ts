/**
 * Per-key async mutual exclusion.
 *
 * Callers with the same key run one after another in arrival order; callers
 * with different keys never wait on each other. Keys are forgotten once their
 * queue drains.
 */
export class KeyedMutex {
  private readonly _tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this._tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this._tails.get(key) === tail) {
        this._tails.delete(key)
      }
    }
  }

  /** Whether any caller currently holds or waits for `key` */
  isLocked(key: string): boolean {
    return this._tails.has(key)
  }
}
