/**
 * Runs tasks one at a time in arrival order. A task starts only after the
 * previous one settled, whether it succeeded or failed.
 */
export class ExecutionSlot {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Whether a task is running or waiting */
  get busy(): boolean {
    return this.pending > 0;
  }

  /** Tasks running or waiting */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
