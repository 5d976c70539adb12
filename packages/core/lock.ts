/**
 * In-process per-key lock
 *
 * Callers holding the same key run one after another, in arrival order;
 * different keys never wait on each other. Used to serialize upserts per
 * ticket URL when adapters run side by side.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  /**
   * Run fn while holding the lock for key
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      // Drop the entry once nobody is queued behind this holder
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /** Number of keys currently held or waited on */
  get size(): number {
    return this.tails.size
  }
}
