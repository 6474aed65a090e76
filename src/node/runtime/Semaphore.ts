import type { PermitPool } from '../adapters/vcs/interface'

/**
 * Counting semaphore. `acquire()` resolves with a release function once a
 * permit is free; waiters are served in arrival order.
 */
export class Semaphore implements PermitPool {
  private available: number
  private readonly waiters: (() => void)[] = []

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Semaphore size must be a positive integer, got ${size}`)
    }
    this.available = size
  }

  get inUse(): number {
    return this.size - this.available
  }

  get pending(): number {
    return this.waiters.length
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    }

    let released = false
    return () => {
      if (released) return
      released = true
      this.release()
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }

  private release(): void {
    const next = this.waiters.shift()
    if (next) {
      // Hand the permit straight to the next waiter.
      next()
    } else {
      this.available++
    }
  }
}
