// Serializes writes so frames from concurrent senders never interleave.

/**
 * An async mutex for the write side of a channel.
 *
 * Each `run()` starts only after every previously queued task has settled,
 * whether it resolved or rejected.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Tasks queued or running. */
  get queued(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  private settle(): void {
    this.pending--;
  }
}
