// ============================================================
// Serial Queue
// ============================================================
// Runs tasks one at a time in submission order on a promise
// chain. Candle closes and trade outcomes go through one queue
// so mode and loss-streak updates never interleave.
// ============================================================

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  /** Tasks submitted and not yet finished */
  get pending(): number {
    return this.depth;
  }

  /**
   * Queue a task. The returned promise settles with the task's result;
   * a failing task rejects its own promise and the queue moves on.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.depth++;
    const result = this.tail.then(task);
    const done = () => {
      this.depth--;
    };
    // The rejection reaches the caller through `result`
    this.tail = result.then(done, done);
    return result;
  }

  /** Resolves once everything queued so far has finished */
  idle(): Promise<void> {
    return this.tail;
  }
}
