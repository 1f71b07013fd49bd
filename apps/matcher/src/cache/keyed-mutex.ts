/**
 * In-process mutual exclusion keyed by string.
 *
 * Tasks sharing a key run one after another in arrival order; tasks on
 * different keys never wait on each other. A key's queue is dropped once
 * its last task settles.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)

    // The queue only tracks completion; the task's own error reaches the caller through `result`.
    const settled = (): void => undefined
    const tail: Promise<void> = result.then(settled, settled).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    })
    this.tails.set(key, tail)

    return result
  }

  /** Whether any task holds or waits for the key */
  isLocked(key: string): boolean {
    return this.tails.has(key)
  }

  get size(): number {
    return this.tails.size
  }
}
