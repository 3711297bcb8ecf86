/**
 * Runs tasks one at a time in submission order. A failing task rejects its
 * own promise and does not stop the tasks queued behind it.
 *
 * Tasks must not submit to the same executor and await the result: the inner
 * task would wait for the outer one forever.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pending;
  }
}
