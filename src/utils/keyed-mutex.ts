/**
 * Serializes async work per key. Callers holding different keys never wait
 * on each other; callers sharing a key run one at a time in arrival order.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map()

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const current = previous.then(() => fn())
    // The tail never rejects, so one failed holder does not poison the queue
    const tail = current.then(() => undefined, () => undefined)
    this.tails.set(key, tail)

    try {
      return await current
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }

  get size(): number {
    return this.tails.size
  }
}
