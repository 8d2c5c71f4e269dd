/**
 * Runs work items one after another, never recursively.
 *
 * Work enqueued while an item is running is appended and runs once the
 * current item returns, so a listener that dispatches during notification
 * sees its action applied after the one being delivered.
 *
 * @example
 * ```typescript
 * const queue = new WorkQueue()
 *
 * queue.enqueue(() => {
 *   apply(first)
 *   queue.enqueue(() => apply(second)) // runs after `first` finishes
 * })
 * ```
 */
export class WorkQueue {
  #queue: Array<() => void> = []
  #isProcessing = false

  /**
   * Adds work to the queue and, unless the queue is already being drained,
   * drains it before returning.
   */
  enqueue(work: () => void): void {
    this.#queue.push(work)
    this.#processUntilEmpty()
  }

  get isProcessing(): boolean {
    return this.#isProcessing
  }

  get size(): number {
    return this.#queue.length
  }

  #processUntilEmpty(): void {
    if (this.#isProcessing) return

    this.#isProcessing = true
    try {
      let work = this.#queue.shift()
      while (work) {
        work()
        work = this.#queue.shift()
      }
    } catch (error) {
      // Pending work was queued against state the failed item never produced
      this.#queue = []
      throw error
    } finally {
      this.#isProcessing = false
    }
  }
}
