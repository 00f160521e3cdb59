/**
 * Promise-based mutual exclusion. Waiters are released in FIFO order.
 *
 * ```ts
 * await mutex.runExclusive(async () => {
 *   // only one caller at a time
 * })
 * ```
 */
export class AsyncMutex {
  private locked = false
  private waiters: Array<() => void> = []

  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    } else {
      this.locked = true
    }

    let released = false
    return () => {
      if (released) return
      released = true
      this.release()
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  isLocked(): boolean {
    return this.locked
  }

  get waiting(): number {
    return this.waiters.length
  }

  private release(): void {
    const next = this.waiters.shift()
    if (next) {
      // ownership passes straight to the next waiter, the lock stays held
      next()
    } else {
      this.locked = false
    }
  }
}
