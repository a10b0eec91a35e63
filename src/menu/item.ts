/**
 * Menu item types
 *
 * Items live in a MenuTree arena and refer to each other by id, so the
 * sibling ring is plain data rather than a web of object references.
 */

import type { Navigator } from '../navigator.js';

/** Stable handle of an item inside its MenuTree */
export type MenuItemId = number;

/** Redraws per second used when an item does not choose its own rate */
export const DEFAULT_REFRESH_RATE = 2;

/**
 * Read-only view of the navigation state handed to text producers
 */
export interface NavigationView {
  /** Number of items on the stack (1 = root menu) */
  readonly depth: number;
  /** True when the visible item is on the root menu */
  readonly isRoot: boolean;
  /** The visible item, undefined before the first push */
  peek(): MenuItem | undefined;
}

export type TextProducer = (view: NavigationView) => string;

/**
 * Source of a title or description: fixed text, or text computed at draw time
 */
export type TextSource =
  | { kind: 'static'; text: string }
  | { kind: 'dynamic'; produce: TextProducer };

/**
 * Side effect run when the action button is pressed on an item.
 * May push a submenu, run a system command, or anything else.
 */
export type MenuAction = (navigator: Navigator) => void | Promise<void>;

export interface MenuItem {
  readonly id: MenuItemId;
  readonly title: TextSource;
  readonly description: TextSource;
  /** null when the item is inert except for navigation */
  readonly action: MenuAction | null;
  /** Redraws per second while visible and lit; 0 disables periodic redraws */
  readonly refreshRate: number;
  /** Previous sibling in the ring, null until linked */
  readonly prev: MenuItemId | null;
  /** Next sibling in the ring, null until linked */
  readonly next: MenuItemId | null;
}

/**
 * Wraps a string or producer as a TextSource
 */
export function textSource(source: string | TextProducer): TextSource {
  return typeof source === 'function'
    ? { kind: 'dynamic', produce: source }
    : { kind: 'static', text: source };
}

export function resolveText(source: TextSource, view: NavigationView): string {
  return source.kind === 'static' ? source.text : source.produce(view);
}

/**
 * True once the item is linked into a ring, including a ring of one
 */
export function hasSiblings(item: MenuItem): boolean {
  return item.prev !== null;
}
