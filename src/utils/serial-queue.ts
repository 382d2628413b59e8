/**
 * Runs async tasks one at a time in submission order.
 *
 * A rejected task rejects only its own promise; the queue carries on with the
 * next task.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Number of tasks submitted and not yet settled
   */
  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
