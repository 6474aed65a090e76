/**
 * Unbounded multi-producer, single-consumer queue. Producers `send`; the one
 * consumer drains it with `for await`. Order of sends is preserved.
 */
export class ActionChannel<T> implements AsyncIterable<T> {
  private readonly buffer: { item: T }[] = []
  private waiting: ((result: IteratorResult<T>) => void) | null = null
  private closed = false

  get isClosed(): boolean {
    return this.closed
  }

  get size(): number {
    return this.buffer.length
  }

  /** Returns false when the channel is already closed and the item was dropped. */
  send(item: T): boolean {
    if (this.closed) return false

    const waiting = this.waiting
    if (waiting) {
      this.waiting = null
      waiting({ value: item, done: false })
    } else {
      this.buffer.push({ item })
    }
    return true
  }

  /** Stops accepting items. Buffered items are still delivered. */
  close(): void {
    if (this.closed) return
    this.closed = true

    const waiting = this.waiting
    if (waiting) {
      this.waiting = null
      waiting({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<T>> {
    const entry = this.buffer.shift()
    if (entry) {
      return Promise.resolve({ value: entry.item, done: false })
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    if (this.waiting) {
      return Promise.reject(new Error('ActionChannel supports a single consumer'))
    }
    return new Promise((resolve) => {
      this.waiting = resolve
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() }
  }
}
