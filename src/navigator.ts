// Menu navigation state machine
// A stack of item ids: bottom is the root menu, top is the visible item

import { type MenuItem, type MenuItemId, type NavigationView, resolveText } from './menu/item.js';
import type { MenuTree } from './menu/tree.js';

/**
 * Receiver of navigation changes (normally the UpdateScheduler)
 */
export interface NavigatorDisplay {
  /** The visible item changed, or must be redrawn; undefined blanks the display */
  show(item: MenuItem | undefined, view: NavigationView): void;
  /** A user interaction that does not change what is shown */
  touch(): void;
}

const DETACHED_DISPLAY: NavigatorDisplay = {
  show: () => undefined,
  touch: () => undefined,
};

/**
 * Navigator - the authority for what is currently displayed
 *
 * None of the operations throw on a missing link or action; those are
 * treated as no-ops.
 */
export class Navigator implements NavigationView {
  private readonly tree: MenuTree;
  private output: NavigatorDisplay;
  private stack: MenuItemId[] = [];

  constructor(tree: MenuTree, output: NavigatorDisplay = DETACHED_DISPLAY) {
    this.tree = tree;
    this.output = output;
  }

  /**
   * Routes display updates to a different receiver
   */
  attach(output: NavigatorDisplay): void {
    this.output = output;
  }

  get depth(): number {
    return this.stack.length;
  }

  get isRoot(): boolean {
    return this.stack.length === 1;
  }

  get isEmpty(): boolean {
    return this.stack.length === 0;
  }

  /**
   * Returns the visible item, undefined before the first push
   */
  peek(): MenuItem | undefined {
    const top = this.stack[this.stack.length - 1];
    return top === undefined ? undefined : this.tree.get(top);
  }

  /**
   * Opens an item one level deeper
   */
  push(id: MenuItemId): void {
    this.tree.get(id); // rejects ids from another tree
    this.stack.push(id);
    this.display();
  }

  /**
   * Replaces the visible item at the same depth (prev/next traversal).
   * On an empty stack this behaves as push.
   */
  swap(id: MenuItemId): void {
    this.tree.get(id); // rejects ids from another tree
    if (this.stack.length === 0) {
      this.stack.push(id);
    } else {
      this.stack[this.stack.length - 1] = id;
    }
    this.display();
  }

  /**
   * Returns to the parent item. The root item is never removed: at depth 1
   * the stack and display are left untouched.
   *
   * @returns the item that was on top before the call
   */
  pop(): MenuItem | undefined {
    const top = this.peek();
    if (this.stack.length > 1) {
      this.stack = this.stack.slice(0, -1);
      this.display();
    }
    return top;
  }

  /**
   * Redraws the visible item
   */
  display(): void {
    this.output.show(this.peek(), this);
  }

  /**
   * Drops every item without drawing (session teardown)
   */
  clear(): void {
    this.stack = [];
  }

  // ==========================================================================
  // Input handlers: one per button
  // ==========================================================================

  doUp(): void {
    if (this.stack.length > 1) {
      this.pop();
    } else {
      this.output.touch();
    }
  }

  doPrev(): void {
    const prev = this.peek()?.prev ?? null;
    if (prev === null) {
      this.output.touch();
      return;
    }
    this.swap(prev);
  }

  doNext(): void {
    const next = this.peek()?.next ?? null;
    if (next === null) {
      this.output.touch();
      return;
    }
    this.swap(next);
  }

  /**
   * Runs the visible item's action, then always redraws: the action may
   * have changed what the item should show. Action errors propagate after
   * the redraw.
   */
  async doAction(): Promise<void> {
    const action = this.peek()?.action ?? null;
    try {
      if (action) {
        await action(this);
      }
    } finally {
      this.display();
    }
  }

  /**
   * Breadcrumb of the stack, e.g. "Menu: Information > Time"
   */
  toString(): string {
    const descent = this.stack
      .map((id) => resolveText(this.tree.get(id).title, this))
      .join(' > ');
    return `Menu: ${descent}`;
  }
}
