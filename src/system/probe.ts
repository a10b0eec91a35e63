/**
 * Status probe
 *
 * Menu text producers are synchronous and run inside redraws, so a slow
 * status command cannot run in them directly. A probe returns the last
 * value it read and refreshes in the background: at most one read in
 * flight, at most one started per interval.
 */

import { describeError } from '../errors.js';
import { type Logger, silentLogger } from '../logging.js';

export interface StatusProbeOptions {
  /** Minimum time between two reads */
  minIntervalMs: number;
  /** Shown until the first read completes */
  placeholder?: string;
  /** Shown after a failed read */
  failureText?: string;
  logger?: Logger;
  now?: () => number;
}

export class StatusProbe {
  private readonly read: () => Promise<string>;
  private readonly minIntervalMs: number;
  private readonly failureText: string;
  private readonly logger: Logger;
  private readonly now: () => number;

  private value: string;
  private inFlight: Promise<void> | null = null;
  private lastStarted: number | null = null;

  constructor(read: () => Promise<string>, options: StatusProbeOptions) {
    this.read = read;
    this.minIntervalMs = options.minIntervalMs;
    this.value = options.placeholder ?? '...';
    this.failureText = options.failureText ?? 'unknown';
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Last known value; starts a background refresh when one is due
   */
  current(): string {
    void this.refresh();
    return this.value;
  }

  /**
   * Starts a read unless one is running or the last one started too recently.
   * Never rejects: failures are logged and shown as the failure text.
   */
  refresh(): Promise<void> {
    if (this.inFlight) return this.inFlight;

    const now = this.now();
    if (this.lastStarted !== null && now - this.lastStarted < this.minIntervalMs) {
      return Promise.resolve();
    }
    this.lastStarted = now;

    this.inFlight = this.read()
      .then(
        (text) => {
          this.value = text.trim();
        },
        (err: unknown) => {
          this.logger.warn(`Status probe failed: ${describeError(err)}`);
          this.value = this.failureText;
        },
      )
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }
}
