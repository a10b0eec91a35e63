/**
 * Display device capability
 *
 * Implemented by character LCD drivers (loaded as plugin modules) and by
 * the terminal fallback. Rows and columns are 0-indexed.
 */

export interface DisplayDevice {
  readonly rows: number;
  readonly cols: number;
  /** Backlight state; assigning switches the light */
  backlight: boolean;
  /** Positions the cursor at (row, col) and writes text from there */
  write(row: number, col: number, text: string): void;
  clear(): void;
  /** Stores a 5x8 bitmap in a custom character slot (0-7), shown as String.fromCharCode(slot) */
  createChar?(slot: number, bitmap: readonly number[]): void;
  close?(): void;
}

/**
 * Indicator glyphs drawn around the title line
 */
export interface Glyphs {
  /** Not on the root menu: the up button goes somewhere */
  up: string;
  /** Other items share this item's ring */
  siblings: string;
  /** The action button does something here */
  action: string;
}

/** Glyphs for devices without custom characters */
export const TEXT_GLYPHS: Glyphs = {
  up: '^',
  siblings: '~',
  action: '*',
};

const GLYPH_NAMES = ['up', 'siblings', 'action'] as const;

/** Custom character slot used for each glyph */
export const GLYPH_SLOTS: Record<keyof Glyphs, number> = {
  up: 0,
  siblings: 1,
  action: 2,
};

/** 5x8 bitmaps, one row per entry, low five bits used */
export const GLYPH_BITMAPS: Record<keyof Glyphs, readonly number[]> = {
  // arrow pointing up-left
  up: [0b11100, 0b11000, 0b10100, 0b00010, 0b00001, 0b00000, 0b00000, 0b00000],
  // left/right arrows
  siblings: [0b00100, 0b01000, 0b11111, 0b01100, 0b00110, 0b11111, 0b00010, 0b00100],
  // carriage return
  action: [0b00001, 0b00001, 0b00001, 0b00101, 0b01001, 0b11111, 0b01000, 0b00100],
};

/**
 * Uploads the indicator bitmaps when the device supports custom characters
 * and returns the glyphs to draw with.
 */
export function installGlyphs(device: DisplayDevice): Glyphs {
  if (!device.createChar) {
    return TEXT_GLYPHS;
  }

  const glyphs: Glyphs = { ...TEXT_GLYPHS };
  for (const name of GLYPH_NAMES) {
    const slot = GLYPH_SLOTS[name];
    device.createChar(slot, GLYPH_BITMAPS[name]);
    glyphs[name] = String.fromCharCode(slot);
  }
  return glyphs;
}

/**
 * Structural check for devices produced by driver modules
 */
export function isDisplayDevice(value: unknown): value is DisplayDevice {
  if (typeof value !== 'object' || value === null) return false;
  if (!('rows' in value) || !('cols' in value) || !('backlight' in value)) return false;
  if (!('write' in value) || !('clear' in value)) return false;

  return (
    typeof value.rows === 'number' &&
    typeof value.cols === 'number' &&
    typeof value.backlight === 'boolean' &&
    typeof value.write === 'function' &&
    typeof value.clear === 'function'
  );
}
