/**
 * Button input
 *
 * Binds four GPIO buttons, through a button driver, to menu commands.
 * The driver owns the electrical side (pull-ups, debouncing).
 */

import type { Command, InputSource } from './commands.js';

/**
 * Button driver capability, supplied by a plugin module
 */
export interface ButtonDriver {
  /** Calls onPress on every press of the button on `pin`; returns an unsubscribe function */
  watch(pin: number, onPress: () => void): () => void;
  close?(): void;
}

export interface ButtonPins {
  up: number;
  previous: number;
  next: number;
  action: number;
}

export function createButtonInput(driver: ButtonDriver, pins: ButtonPins): InputSource {
  let unsubscribers: (() => void)[] = [];

  const bindings: [number, Command][] = [
    [pins.up, 'up'],
    [pins.previous, 'previous'],
    [pins.next, 'next'],
    [pins.action, 'action'],
  ];

  return {
    start(onCommand) {
      if (unsubscribers.length > 0) return;
      unsubscribers = bindings.map(([pin, command]) => driver.watch(pin, () => onCommand(command)));
    },

    stop() {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
      unsubscribers = [];
      driver.close?.();
    },
  };
}

export function isButtonDriver(value: unknown): value is ButtonDriver {
  return (
    typeof value === 'object' &&
    value !== null &&
    'watch' in value &&
    typeof value.watch === 'function'
  );
}
