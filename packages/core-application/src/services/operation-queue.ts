/**
 * Runs tasks one at a time in submission order. Every task that awaits the
 * store and then touches the rows goes through here, so a resync can never
 * land in the middle of a bulk operation.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get busy(): boolean {
    return this.pending > 0;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;

    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });

    // a failed task must not block the ones queued after it
    this.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }
}
