// Line formatting for fixed-width character displays
// Pads, justifies or scrolls a message between optional indicator glyphs

export type Justify = 'left' | 'center' | 'right';

export interface LineFormat {
  /** Glyphs placed before the message (e.g. the "go up" indicator) */
  prefix?: string;
  /** Glyphs placed after the message (e.g. sibling and action indicators) */
  suffix?: string;
  justify?: Justify;
  /** Redraw counter; selects the scroll position of messages that do not fit */
  tick?: number;
}

/** Gap inserted between the end of a scrolling message and its restart */
export const MARQUEE_SEPARATOR = ' ';

function justifyText(text: string, width: number, justify: Justify): string {
  const padding = width - text.length;
  if (justify === 'right') {
    return ' '.repeat(padding) + text;
  }
  if (justify === 'center') {
    const left = Math.floor(padding / 2);
    return ' '.repeat(left) + text + ' '.repeat(padding - left);
  }
  return text + ' '.repeat(padding);
}

/**
 * Window into the message rotated left by `tick` characters.
 * The cycle length is message.length + 1 (the separator takes a slot).
 */
export function rotateText(message: string, width: number, tick: number): string {
  const period = message.length + 1;
  const start = ((Math.trunc(tick) % period) + period) % period;
  const ring = message + MARQUEE_SEPARATOR + message;
  return ring.slice(start, start + width);
}

/**
 * Formats a message into exactly `width` characters.
 *
 * The body sits between prefix and suffix. A body that fits is justified;
 * one that does not is shown as a scrolling window selected by `tick`.
 * When the glyphs alone fill the line they are truncated to the width.
 */
export function formatLine(message: string, width: number, format: LineFormat = {}): string {
  const prefix = format.prefix ?? '';
  const suffix = format.suffix ?? '';
  const size = Math.max(0, Math.floor(width));
  const bodyWidth = size - prefix.length - suffix.length;

  if (bodyWidth <= 0) {
    return (prefix + suffix).slice(0, size);
  }

  const body =
    message.length <= bodyWidth
      ? justifyText(message, bodyWidth, format.justify ?? 'left')
      : rotateText(message, bodyWidth, format.tick ?? 0);

  return prefix + body + suffix;
}
