/**
 * Keel Kernel — Serial Queue
 *
 * Runs async tasks one at a time in submission order. Used to give an
 * external service a single owner: callers on any number of concurrent
 * compilations submit work, and the service only ever sees one call at a time.
 *
 * A failing task does not stall the queue; its rejection is delivered to its
 * own caller and the next task starts.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Number of tasks submitted and not yet settled. */
  get pending(): number {
    return this.waiting;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  private release(): void {
    this.waiting -= 1;
  }
}
