/**
 * In-memory display device for tests
 *
 * Records every device call and keeps a character grid of what a real
 * display would show.
 */

import type { DisplayDevice } from '../display/device.js';

export interface WriteRecord {
  row: number;
  col: number;
  text: string;
}

export interface RecordingDisplayOptions {
  rows?: number;
  cols?: number;
  /** Expose createChar like an HD44780 driver does */
  customChars?: boolean;
}

export class RecordingDisplay implements DisplayDevice {
  readonly rows: number;
  readonly cols: number;
  readonly writes: WriteRecord[] = [];
  /** Every value assigned to the backlight, in order */
  readonly backlightChanges: boolean[] = [];
  readonly customChars = new Map<number, readonly number[]>();
  clears = 0;
  closed = false;
  createChar?: (slot: number, bitmap: readonly number[]) => void;

  private lit = true;
  private grid: string[];

  constructor(options: RecordingDisplayOptions = {}) {
    this.rows = options.rows ?? 2;
    this.cols = options.cols ?? 16;
    this.grid = Array.from({ length: this.rows }, () => ' '.repeat(this.cols));

    if (options.customChars) {
      this.createChar = (slot, bitmap) => {
        this.customChars.set(slot, bitmap);
      };
    }
  }

  get backlight(): boolean {
    return this.lit;
  }

  set backlight(on: boolean) {
    this.lit = on;
    this.backlightChanges.push(on);
  }

  write(row: number, col: number, text: string): void {
    this.writes.push({ row, col, text });
    const line = this.grid[row];
    this.grid[row] = (line.slice(0, col) + text + line.slice(col + text.length)).slice(0, this.cols);
  }

  clear(): void {
    this.clears++;
    this.grid = this.grid.map(() => ' '.repeat(this.cols));
  }

  close(): void {
    this.closed = true;
  }

  /** Current screen content, one string per row */
  lines(): string[] {
    return [...this.grid];
  }

  resetLog(): void {
    this.writes.length = 0;
    this.backlightChanges.length = 0;
    this.clears = 0;
  }
}
