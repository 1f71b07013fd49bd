/**
 * Fixed-capacity FIFO. Pushing into a full buffer evicts the oldest item.
 */
export class RingBuffer<T> {
  private readonly items: T[] = []
  private head = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`)
    }
  }

  /** Returns the evicted item, if any */
  push(item: T): T | undefined {
    if (this.items.length < this.capacity) {
      this.items.push(item)
      return undefined
    }

    const evicted = this.items[this.head]
    this.items[this.head] = item
    this.head = (this.head + 1) % this.capacity
    return evicted
  }

  get size(): number {
    return this.items.length
  }

  count(predicate: (item: T) => boolean): number {
    let total = 0
    for (const item of this.items) {
      if (predicate(item)) total++
    }
    return total
  }

  /** Oldest first */
  toArray(): T[] {
    return [...this.items.slice(this.head), ...this.items.slice(0, this.head)]
  }

  clear(): void {
    this.items.length = 0
    this.head = 0
  }
}
