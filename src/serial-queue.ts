/**
 * Runs tasks one at a time, in submission order
 *
 * Button presses, keystrokes and timer callbacks all mutate the navigator
 * and scheduler; an action that awaits a system command must not have a
 * redraw or another press run halfway through it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Tasks submitted and not yet settled */
  get size(): number {
    return this.pending;
  }

  /**
   * Queues a task. The returned promise settles with the task's result;
   * a failing task does not stop the tasks queued after it.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
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

  /**
   * Resolves once every task queued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
