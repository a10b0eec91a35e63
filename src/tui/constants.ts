/**
 * Shared constants for the terminal display
 */

// ============================================================================
// ANSI Escape Codes
// ============================================================================

export const RESET = '\x1b[0m';
export const DIM = '\x1b[2m';

// Display panel with the backlight on: black on green
export const PANEL_LIT = '\x1b[42;30m';

// Display panel with the backlight off: dark grey on black
export const PANEL_DARK = '\x1b[40;90m';

export const SHOW_CURSOR = '\x1b[?25h';
export const CLEAR_SCREEN = '\x1b[2J';
export const CURSOR_HOME = '\x1b[H';

// ============================================================================
// Layout
// ============================================================================

/** Terminal column and row (1-based) of the panel frame's top-left corner */
export const PANEL_ORIGIN = { x: 2, y: 2 } as const;

/** Blank rows between the panel and the message area below it */
export const MESSAGE_GAP = 1;
