/**
 * Terminal display
 *
 * Draws the character display as a framed panel in the terminal so the
 * menu runs on a machine without an LCD. The backlight is shown as the
 * panel colour. Implements the same DisplayDevice contract as a driver.
 */

import termKit from 'terminal-kit';
import type { DisplayDevice } from '../display/device.js';
import {
  CLEAR_SCREEN,
  CURSOR_HOME,
  DIM,
  MESSAGE_GAP,
  PANEL_DARK,
  PANEL_LIT,
  PANEL_ORIGIN,
  RESET,
  SHOW_CURSOR,
} from './constants.js';

const term = termKit.terminal;

export interface TerminalDisplayOptions {
  rows: number;
  cols: number;
}

export class TerminalDisplay implements DisplayDevice {
  readonly rows: number;
  readonly cols: number;

  // What the panel shows, kept so a backlight change can repaint it
  private readonly cells: string[];
  private lit = true;
  private opened = false;

  constructor(options: TerminalDisplayOptions) {
    this.rows = options.rows;
    this.cols = options.cols;
    this.cells = Array.from({ length: this.rows }, () => ' '.repeat(this.cols));
  }

  get backlight(): boolean {
    return this.lit;
  }

  set backlight(on: boolean) {
    if (this.lit === on) return;
    this.lit = on;
    this.paintAll();
  }

  /**
   * Takes over the terminal and draws the empty panel
   */
  open(): void {
    if (this.opened) return;
    this.opened = true;

    term.fullscreen(true);
    term.hideCursor();
    term.clear();
    this.drawFrame();
    this.paintAll();
  }

  write(row: number, col: number, text: string): void {
    if (row < 0 || row >= this.rows || col >= this.cols) return;

    const line = this.cells[row];
    const visible = text.slice(0, this.cols - col);
    this.cells[row] = line.slice(0, col) + visible + line.slice(col + visible.length);
    this.paint(row, col, visible);
  }

  clear(): void {
    for (let row = 0; row < this.rows; row++) {
      this.cells[row] = ' '.repeat(this.cols);
    }
    this.paintAll();
  }

  /**
   * Shows a message (key help) below the panel, replacing the previous one
   */
  showMessage(text: string): void {
    if (!this.opened) return;

    const top = PANEL_ORIGIN.y + this.rows + 2 + MESSAGE_GAP;
    const width = Math.max(1, (term.width || 80) - PANEL_ORIGIN.x);
    const lines = text.split('\n');

    for (let i = 0; i < lines.length; i++) {
      term.moveTo(PANEL_ORIGIN.x, top + i);
      term.eraseLine();
      process.stdout.write(`${DIM}${lines[i].slice(0, width)}${RESET}`);
    }
  }

  /**
   * Restores the terminal: input released, normal screen, cursor visible
   */
  close(): void {
    if (!this.opened) return;
    this.opened = false;

    term.grabInput(false);
    term.fullscreen(false);
    term.styleReset();

    if (process.stdin.isTTY && process.stdin.setRawMode) {
      process.stdin.setRawMode(false);
    }

    process.stdout.write(SHOW_CURSOR);
    process.stdout.write(CLEAR_SCREEN);
    process.stdout.write(CURSOR_HOME);
  }

  private drawFrame(): void {
    const { x, y } = PANEL_ORIGIN;
    const horizontal = '─'.repeat(this.cols);

    term.moveTo(x, y);
    process.stdout.write(`┌${horizontal}┐`);
    for (let row = 0; row < this.rows; row++) {
      term.moveTo(x, y + 1 + row);
      process.stdout.write('│');
      term.moveTo(x + 1 + this.cols, y + 1 + row);
      process.stdout.write('│');
    }
    term.moveTo(x, y + 1 + this.rows);
    process.stdout.write(`└${horizontal}┘`);
  }

  private paintAll(): void {
    for (let row = 0; row < this.rows; row++) {
      this.paint(row, 0, this.cells[row]);
    }
  }

  private paint(row: number, col: number, text: string): void {
    if (!this.opened || text.length === 0) return;

    term.moveTo(PANEL_ORIGIN.x + 1 + col, PANEL_ORIGIN.y + 1 + row);
    process.stdout.write(`${this.lit ? PANEL_LIT : PANEL_DARK}${printable(text)}${RESET}`);
  }
}

/**
 * Control characters (custom glyph slots on an LCD) are shown as '?'
 */
function printable(text: string): string {
  return text.replace(/[\x00-\x1f\x7f]/g, '?');
}
