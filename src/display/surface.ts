/**
 * Display surface
 *
 * Keeps the desired content of every row next to a shadow of what the
 * device last received, and on flush writes only the changed spans.
 * Character LCDs are slow and visibly flicker on full rewrites, so a row
 * that did not change is never written.
 */

import type { DisplayDevice } from './device.js';

/** Unchanged characters allowed inside one write before it is split in two */
export const DEFAULT_MERGE_GAP = 3;

export interface Span {
  col: number;
  text: string;
}

export interface CursorPosition {
  row: number;
  col: number;
}

/**
 * Computes the writes that turn `previous` into `next`.
 *
 * Differing characters are grouped into spans; two spans separated by at
 * most `mergeGap` unchanged characters are written as one. A null previous
 * (device content unknown) yields a single span covering the whole row.
 */
export function changedSpans(previous: string | null, next: string, mergeGap: number): Span[] {
  if (previous === null) {
    return next.length > 0 ? [{ col: 0, text: next }] : [];
  }

  const ranges: { start: number; end: number }[] = [];
  const length = Math.max(previous.length, next.length);

  for (let col = 0; col < length; col++) {
    if (previous[col] === next[col]) continue;

    const last = ranges[ranges.length - 1];
    if (last && col - last.end <= mergeGap) {
      last.end = col + 1;
    } else {
      ranges.push({ start: col, end: col + 1 });
    }
  }

  return ranges
    .map(({ start, end }) => ({ col: start, text: next.slice(start, end) }))
    .filter((span) => span.text.length > 0);
}

export class DisplaySurface {
  private readonly device: DisplayDevice;
  private readonly mergeGap: number;
  private readonly blank: string;
  private readonly desired: string[];
  private readonly shadow: (string | null)[];
  private cursor: CursorPosition = { row: 0, col: 0 };

  constructor(device: DisplayDevice, mergeGap: number = DEFAULT_MERGE_GAP) {
    this.device = device;
    this.mergeGap = Math.max(0, mergeGap);
    this.blank = ' '.repeat(device.cols);
    this.desired = Array.from({ length: device.rows }, () => this.blank);
    // Device content is unknown until the first clear or flush
    this.shadow = Array.from({ length: device.rows }, () => null);
  }

  get rows(): number {
    return this.device.rows;
  }

  get cols(): number {
    return this.device.cols;
  }

  get backlight(): boolean {
    return this.device.backlight;
  }

  /** Where the device cursor was left by the last write */
  get cursorPosition(): CursorPosition {
    return { ...this.cursor };
  }

  /**
   * Desired content of a row, always exactly `cols` characters
   */
  line(row: number): string {
    return this.desired[this.checkRow(row)];
  }

  /**
   * Stores the desired content of a row, padded or cut to the width.
   * Nothing reaches the device until flush().
   */
  setLine(row: number, text: string): void {
    this.desired[this.checkRow(row)] = text.padEnd(this.cols).slice(0, this.cols);
  }

  /**
   * Writes the changed spans of every row to the device
   *
   * @returns the number of device writes issued
   */
  flush(): number {
    let writes = 0;

    for (let row = 0; row < this.rows; row++) {
      const next = this.desired[row];
      const previous = this.shadow[row];
      if (previous === next) continue;

      for (const span of changedSpans(previous, next, this.mergeGap)) {
        this.device.write(row, span.col, span.text);
        this.cursor = { row, col: span.col + span.text.length };
        writes++;
      }
      this.shadow[row] = next;
    }

    return writes;
  }

  /**
   * Blanks the device and both buffers
   */
  clear(): void {
    this.device.clear();
    for (let row = 0; row < this.rows; row++) {
      this.desired[row] = this.blank;
      this.shadow[row] = this.blank;
    }
    this.cursor = { row: 0, col: 0 };
  }

  /**
   * Switches the backlight, skipping the device when it is already in that state
   *
   * @returns true if the device was switched
   */
  setBacklight(on: boolean): boolean {
    if (this.device.backlight === on) return false;
    this.device.backlight = on;
    return true;
  }

  private checkRow(row: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new RangeError(`Row ${row} is outside a ${this.rows}-row display`);
    }
    return row;
  }
}
