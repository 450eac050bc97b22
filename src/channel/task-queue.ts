/** A deferred, parameterless unit of work. Runs exactly once. */
export type QueuedAction = () => void | Promise<void>

/**
 * FIFO of single-use actions owned by one thread.
 *
 * enqueue() never waits on the consumer. drainAndRunAll() pops the front
 * action and only then runs it, repeating until the queue is observed
 * empty; an action enqueued during a drain is picked up by that same drain.
 * Actions run one at a time: an action returning a promise is awaited
 * before the next one starts.
 */
export class TaskQueue {
  private readonly actions: QueuedAction[] = []
  private current: Promise<void> | null = null
  private busy = false

  /** @param onError - receives anything an action throws or rejects with */
  constructor(private readonly onError: (err: unknown) => void) {}

  enqueue(action: QueuedAction): void {
    this.actions.push(action)
  }

  get size(): number {
    return this.actions.length
  }

  /**
   * Run every queued action in order. Concurrent callers share the drain
   * already in progress. Never rejects.
   */
  drainAndRunAll(): Promise<void> {
    if (this.current) return this.current
    const current = this.drain()
    // drain() finishes synchronously when the queue was already empty
    if (this.busy) this.current = current
    return current
  }

  private async drain(): Promise<void> {
    this.busy = true
    try {
      for (;;) {
        const action = this.actions.shift()
        if (action === undefined) return
        try {
          await action()
        } catch (err) {
          this.onError(err)
        }
      }
    } finally {
      this.busy = false
      this.current = null
    }
  }
}
