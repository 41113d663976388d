/**
 * Promise-chain mutual exclusion keyed by string (one lane per account).
 *
 * Work queued under the same key runs strictly one at a time in arrival order;
 * different keys never wait on each other. Lanes are dropped once drained.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  /** Run fn while holding the lock for key. */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const held = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = prev.then(() => held)
    this.tails.set(key, tail)

    await prev
    try {
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }
  }

  /** True while some caller holds or waits for key. */
  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}

export default KeyedMutex
