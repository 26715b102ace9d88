/**
 * reload-lock.ts — Serializes graph reloads.
 *
 * Queries never take this lock; they read whichever snapshot is current.
 * Only reloads queue here, so two reloads cannot interleave their swaps.
 */

export class ReloadLock {
  private tail: Promise<void> = Promise.resolve()
  private waiting = 0

  /** Number of reloads queued or running. */
  get pending(): number {
    return this.waiting
  }

  /**
   * Runs `task` after every previously queued task has settled.
   * A rejection reaches the caller and does not block later tasks.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail
    let done!: () => void
    this.tail = new Promise<void>((resolve) => {
      done = resolve
    })
    this.waiting++

    await previous
    try {
      return await task()
    } finally {
      this.waiting--
      done()
    }
  }
}
