/**
 * One-shot timer tasks with an explicit lifecycle
 *
 * pending -> fired, or pending -> cancelled. Cancelling a task that already
 * fired is a normal outcome and reports false instead of failing.
 */

export type TimerState = 'pending' | 'fired' | 'cancelled';

export class TimerTask {
  private handle: ReturnType<typeof setTimeout> | null;
  private current: TimerState = 'pending';

  constructor(delayMs: number, callback: () => void) {
    this.handle = setTimeout(() => {
      if (this.current !== 'pending') return;
      this.current = 'fired';
      this.handle = null;
      callback();
    }, Math.max(0, delayMs));
  }

  get state(): TimerState {
    return this.current;
  }

  /**
   * @returns true if the task was still pending and will now never fire
   */
  cancel(): boolean {
    if (this.current !== 'pending') return false;

    this.current = 'cancelled';
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
    return true;
  }
}

export function schedule(delayMs: number, callback: () => void): TimerTask {
  return new TimerTask(delayMs, callback);
}
