/**
 * Update scheduler
 *
 * Decides when the display surface is redrawn and owns the backlight:
 * - every interaction "touches": backlight on, idle timer restarted
 * - the idle timer switches the backlight off and stops redraws
 * - a newly shown item is drawn at once, then redrawn every
 *   1 / refreshRate seconds while it stays visible and lit
 *
 * Timer callbacks run through `serialize` so they cannot interleave with
 * input handling, and each callback checks that its task is still the
 * current one: a timer that fired just before being replaced does nothing.
 */

import type { Glyphs } from '../display/device.js';
import { TEXT_GLYPHS } from '../display/device.js';
import type { DisplaySurface } from '../display/surface.js';
import { formatLine } from '../format.js';
import { type Logger, silentLogger } from '../logging.js';
import { hasSiblings, type MenuItem, type NavigationView, resolveText, type TextSource } from '../menu/item.js';
import type { NavigatorDisplay } from '../navigator.js';
import { schedule, type TimerTask } from './timers.js';

/** Idle time before the backlight goes off */
export const DEFAULT_BACKLIGHT_DELAY_MS = 30_000;

export interface UpdateSchedulerOptions {
  backlightDelayMs?: number;
  glyphs?: Glyphs;
  /** Runs timer work in the caller's serialization context; defaults to running it directly */
  serialize?: (task: () => void) => void;
  logger?: Logger;
}

export class UpdateScheduler implements NavigatorDisplay {
  private readonly surface: DisplaySurface;
  private readonly backlightDelayMs: number;
  private readonly glyphs: Glyphs;
  private readonly serialize: (task: () => void) => void;
  private readonly logger: Logger;

  // Idle timer that dims the backlight
  private backlightTimer: TimerTask | null = null;

  // Periodic redraw of the visible item
  private redrawTimer: TimerTask | null = null;

  private visible: MenuItem | undefined;
  private view: NavigationView | null = null;

  // Scroll position of long lines; back to 0 whenever an item is shown
  private tick = 0;

  private draws = 0;
  private closed = false;

  constructor(surface: DisplaySurface, options: UpdateSchedulerOptions = {}) {
    this.surface = surface;
    this.backlightDelayMs = options.backlightDelayMs ?? DEFAULT_BACKLIGHT_DELAY_MS;
    this.glyphs = options.glyphs ?? TEXT_GLYPHS;
    this.serialize = options.serialize ?? ((task) => task());
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of draws since construction */
  get drawCount(): number {
    return this.draws;
  }

  get isLit(): boolean {
    return this.surface.backlight;
  }

  get hasPendingRedraw(): boolean {
    return this.redrawTimer?.state === 'pending';
  }

  get hasPendingDim(): boolean {
    return this.backlightTimer?.state === 'pending';
  }

  /**
   * Records an interaction: backlight on and the idle timer restarted.
   * Waking a dark display resumes the redraw cadence of the visible item.
   */
  touch(): void {
    if (this.closed) return;

    const wasDark = !this.surface.backlight;
    this.backlightTimer?.cancel();
    this.surface.setBacklight(true);

    const timer = schedule(this.backlightDelayMs, () => {
      this.serialize(() => {
        if (this.backlightTimer !== timer) return;
        this.dim();
      });
    });
    this.backlightTimer = timer;

    if (wasDark && this.visible && !this.hasPendingRedraw) {
      this.armRedraw();
    }
  }

  /**
   * Shows an item: touch, draw now, then keep redrawing at its refresh rate.
   * An undefined item blanks the display.
   */
  show(item: MenuItem | undefined, view: NavigationView): void {
    if (this.closed) return;

    this.touch();
    this.cancelRedraw();
    this.visible = item;
    this.view = view;
    this.tick = 0;

    if (!item) {
      this.surface.clear();
      return;
    }

    this.draw();
    this.armRedraw();
  }

  /**
   * Backlight off and redraws stopped: an unlit display is not redrawn
   */
  dim(): void {
    this.backlightTimer?.cancel();
    this.backlightTimer = null;
    this.cancelRedraw();
    this.surface.setBacklight(false);
    this.logger.debug('Backlight off after idle timeout');
  }

  /**
   * Cancels both timers and leaves the device blank and dark.
   * Safe to call more than once.
   */
  close(): void {
    this.backlightTimer?.cancel();
    this.backlightTimer = null;
    this.cancelRedraw();
    this.visible = undefined;
    this.view = null;

    if (!this.closed) {
      this.closed = true;
      this.surface.clear();
      this.surface.setBacklight(false);
    }
  }

  private cancelRedraw(): void {
    this.redrawTimer?.cancel();
    this.redrawTimer = null;
  }

  private armRedraw(): void {
    const item = this.visible;
    if (!item || item.refreshRate <= 0) return;

    const timer = schedule(1000 / item.refreshRate, () => {
      this.serialize(() => {
        if (this.redrawTimer !== timer) return;
        this.redrawTimer = null;
        if (this.closed || !this.surface.backlight || this.visible !== item) return;

        this.tick++;
        this.draw();
        this.armRedraw();
      });
    });
    this.redrawTimer = timer;
  }

  private draw(): void {
    const item = this.visible;
    const view = this.view;
    if (!item || !view) return;

    const { cols, rows } = this.surface;
    let suffix = '';
    if (hasSiblings(item)) suffix += this.glyphs.siblings;
    if (item.action) suffix += this.glyphs.action;

    this.surface.setLine(
      0,
      formatLine(this.produce(item.title, view), cols, {
        prefix: view.isRoot ? '' : this.glyphs.up,
        suffix,
        tick: this.tick,
      }),
    );

    if (rows > 1) {
      this.surface.setLine(
        1,
        formatLine(this.produce(item.description, view), cols, {
          justify: 'right',
          tick: this.tick,
        }),
      );
    }

    this.surface.flush();
    this.draws++;
  }

  private produce(source: TextSource, view: NavigationView): string {
    try {
      return resolveText(source, view);
    } catch (err) {
      this.logger.warn('Menu text producer failed', err);
      return '';
    }
  }
}
