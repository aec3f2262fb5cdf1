/**
 * Serialization point for calls into a backend.
 *
 * Decompiler state may only be touched by one caller at a time. Every task
 * handed to the executor runs after the previous one has settled, in the
 * order it was submitted, whether its predecessors succeeded or failed.
 */
export class BackendExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /**
   * Queue a task and resolve with its result once it has run.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task).finally(() => {
      this.queued--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Tasks submitted and not yet settled. */
  get pending(): number {
    return this.queued;
  }

  /**
   * Resolve once everything submitted so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
