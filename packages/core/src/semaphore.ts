/**
 * In-memory counting semaphore.
 *
 * Bounds how many publish workflows run at once against the shared registry,
 * build backend and buckets. Waiters are served in arrival order.
 */
export class Semaphore {
  private available: number
  private readonly waiters: Array<() => void> = []

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${size}`)
    }

    this.available = size
  }

  /** Number of workflows currently waiting for a slot. */
  get pending(): number {
    return this.waiters.length
  }

  /**
   * Wait for a free slot. Returns an idempotent release function.
   */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--
    } else {
      await new Promise<void>(resolve => {
        this.waiters.push(resolve)
      })
    }

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      const next = this.waiters.shift()
      if (next) {
        // Hand the slot over directly so a late acquirer cannot overtake a waiter
        next()
      } else {
        this.available++
      }
    }
  }

  /**
   * Run `fn` while holding a slot. The slot is released on every exit path.
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
