// Menu tree arena
// Owns every menu item for the lifetime of the process and links sibling rings

import {
  DEFAULT_REFRESH_RATE,
  type MenuAction,
  type MenuItem,
  type MenuItemId,
  type TextProducer,
  type TextSource,
  textSource,
} from './item.js';

/**
 * Mutable backing record; only the tree writes to it, and only while linking
 */
interface MenuItemRecord {
  id: MenuItemId;
  title: TextSource;
  description: TextSource;
  action: MenuAction | null;
  refreshRate: number;
  prev: MenuItemId | null;
  next: MenuItemId | null;
}

export interface MenuItemOptions {
  action?: MenuAction;
  /** Redraws per second; defaults to the tree's default rate */
  refreshRate?: number;
}

export class MenuTree {
  private readonly records: MenuItemRecord[] = [];
  private readonly defaultRefreshRate: number;

  constructor(defaultRefreshRate: number = DEFAULT_REFRESH_RATE) {
    this.defaultRefreshRate = checkRefreshRate(defaultRefreshRate);
  }

  /** Number of items created so far */
  get size(): number {
    return this.records.length;
  }

  /**
   * Creates an unlinked item. Title and description may be fixed strings
   * or producers evaluated on every draw.
   */
  item(
    title: string | TextProducer,
    description: string | TextProducer,
    options: MenuItemOptions = {},
  ): MenuItemId {
    const id = this.records.length;
    this.records.push({
      id,
      title: textSource(title),
      description: textSource(description),
      action: options.action ?? null,
      refreshRate: checkRefreshRate(options.refreshRate ?? this.defaultRefreshRate),
      prev: null,
      next: null,
    });
    return id;
  }

  get(id: MenuItemId): MenuItem {
    return this.record(id);
  }

  has(id: MenuItemId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.records.length;
  }

  /**
   * Links items into a circular ring in the order given.
   *
   * With a parent, the parent's action becomes "open this ring at its first
   * item" and the parent is returned; without one the first item is returned.
   */
  link(parent: MenuItemId | null, first: MenuItemId, ...rest: MenuItemId[]): MenuItemId {
    const ring = [first, ...rest].map((id) => this.record(id));

    ring.forEach((record, index) => {
      record.next = ring[(index + 1) % ring.length].id;
      record.prev = ring[(index - 1 + ring.length) % ring.length].id;
    });

    if (parent === null) {
      return first;
    }

    this.record(parent).action = (navigator) => navigator.push(first);
    return parent;
  }

  next(id: MenuItemId): MenuItemId | null {
    return this.record(id).next;
  }

  prev(id: MenuItemId): MenuItemId | null {
    return this.record(id).prev;
  }

  private record(id: MenuItemId): MenuItemRecord {
    if (!this.has(id)) {
      throw new RangeError(`Unknown menu item id: ${id}`);
    }
    return this.records[id];
  }
}

function checkRefreshRate(rate: number): number {
  if (!Number.isFinite(rate) || rate < 0) {
    throw new RangeError(`Refresh rate must be a finite number >= 0, got ${rate}`);
  }
  return rate;
}
