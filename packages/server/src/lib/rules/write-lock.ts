/**
 * Single-writer lock for Learning transitions.
 *
 * Tasks run one at a time in submission order. Only writers take the lock;
 * reads of the stores never wait on it.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while a task is queued or running */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
