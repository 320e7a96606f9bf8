/**
 * Serial executor shared by every store in one tree.
 *
 * Tasks run one at a time in submission order. A task submitted while another
 * is running (a subscriber dispatching, an effect completing during a
 * dispatch) is queued and runs once the current task returns, so reducer
 * invocations and state writes within a tree never interleave.
 */
export class SerialExecutor {
  private queue: Array<() => void> = []
  private draining = false

  /** Whether a task is currently running. */
  get busy(): boolean {
    return this.draining
  }

  /** Number of tasks waiting behind the running one. */
  get pending(): number {
    return this.queue.length
  }

  /**
   * Runs `task` now if the executor is idle, otherwise after every task
   * already queued. A task that throws does not stop the drain: the queue is
   * emptied first, then the error is rethrown to the caller that started the
   * drain. Several failures are rethrown together as an `AggregateError`.
   */
  execute(task: () => void): void {
    this.queue.push(task)
    if (!this.draining) {
      this.drain()
    }
  }

  private drain(): void {
    const failures: unknown[] = []
    this.draining = true
    try {
      let task = this.queue.shift()
      while (task) {
        try {
          task()
        } catch (error) {
          failures.push(error)
        }
        task = this.queue.shift()
      }
    } finally {
      this.draining = false
    }

    if (failures.length === 1) throw failures[0]
    if (failures.length > 1) throw new AggregateError(failures, 'Several queued tasks failed.')
  }
}
