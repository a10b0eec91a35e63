/**
 * Menu session
 *
 * Wires device, surface, scheduler, navigator and inputs together for one
 * run. Whatever ends the run (quit command, signal, error) the teardown
 * path cancels the timers, empties the stack and leaves the device blank
 * with the backlight off.
 */

import { type DisplayDevice, installGlyphs } from './display/device.js';
import { DisplaySurface } from './display/surface.js';
import { describeError } from './errors.js';
import { type Command, CommandDispatcher, type InputSource } from './input/commands.js';
import { type Logger, silentLogger } from './logging.js';
import type { MenuItemId } from './menu/item.js';
import { MenuTree } from './menu/tree.js';
import { Navigator } from './navigator.js';
import { UpdateScheduler } from './scheduler/update-scheduler.js';
import { SerialQueue } from './serial-queue.js';

export interface SessionOptions {
  device: DisplayDevice;
  /** Builds the menu into the tree and returns the root item */
  buildMenu: (tree: MenuTree) => MenuItemId;
  inputs?: InputSource[];
  backlightDelayMs?: number;
  defaultRefreshRate?: number;
  mergeGap?: number;
  /** Shows the key help after an unrecognized command */
  onHelp?: (text: string) => void;
  logger?: Logger;
  /** End the session on SIGINT / SIGTERM */
  handleSignals?: boolean;
}

export interface MenuSession {
  readonly navigator: Navigator;
  readonly scheduler: UpdateScheduler;
  readonly surface: DisplaySurface;
  /** Queues a command; resolves with true if it ended the session */
  dispatch(command: Command): Promise<boolean>;
  /**
   * Settles when the session ends: resolves on quit or signal, rejects on
   * error. The error is logged before rejecting, so leaving this unobserved
   * does not raise an unhandled rejection.
   */
  readonly finished: Promise<void>;
  /** Tears the session down; idempotent */
  stop(): void;
}

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function startSession(options: SessionOptions): MenuSession {
  const logger = options.logger ?? silentLogger;
  const inputs = options.inputs ?? [];
  const queue = new SerialQueue();

  let stopped = false;
  let settle: { resolve: () => void; reject: (err: unknown) => void } | null = null;
  const finished = new Promise<void>((resolve, reject) => {
    settle = { resolve, reject };
  });
  // Marks the rejection as observed; awaiting `finished` still sees it
  void finished.catch(() => undefined);

  function end(err?: unknown): void {
    if (!settle) return;
    const { resolve, reject } = settle;
    settle = null;
    if (err === undefined) {
      resolve();
    } else {
      reject(err);
    }
  }

  const surface = new DisplaySurface(options.device, options.mergeGap);
  const scheduler = new UpdateScheduler(surface, {
    backlightDelayMs: options.backlightDelayMs,
    glyphs: installGlyphs(options.device),
    logger,
    serialize: (task) => {
      queue.run(task).catch((err: unknown) => {
        logger.error(`Scheduled redraw failed: ${describeError(err)}`, err);
        end(err);
      });
    },
  });

  const tree = new MenuTree(options.defaultRefreshRate);
  const navigator = new Navigator(tree, scheduler);
  const dispatcher = new CommandDispatcher(navigator, { onHelp: options.onHelp, logger });

  function dispatch(command: Command): Promise<boolean> {
    if (stopped) return Promise.resolve(true);

    return queue.run(() => dispatcher.execute(command)).then(
      (quit) => {
        if (quit) end();
        return quit;
      },
      (err: unknown) => {
        logger.error(`Command "${command}" failed: ${describeError(err)}`, err);
        end(err);
        return true;
      },
    );
  }

  function onSignal(signal: NodeJS.Signals): void {
    logger.info(`Received ${signal}, ending session`);
    end();
  }

  function stop(): void {
    if (stopped) return;
    stopped = true;

    for (const signal of SIGNALS) {
      process.off(signal, onSignal);
    }
    for (const input of inputs) {
      input.stop();
    }

    scheduler.close();
    navigator.clear();
    options.device.close?.();
    end();
    logger.info('Session closed');
  }

  if (options.handleSignals) {
    for (const signal of SIGNALS) {
      process.on(signal, onSignal);
    }
  }

  try {
    surface.clear();
    navigator.push(options.buildMenu(tree));
  } catch (err) {
    stop();
    throw err;
  }
  logger.info(`Session started: ${navigator.toString()}`);

  for (const input of inputs) {
    input.start((command) => {
      void dispatch(command);
    });
  }

  return {
    navigator,
    scheduler,
    surface,
    dispatch,
    finished,
    stop,
  };
}

/**
 * Runs a session until it ends, always tearing it down
 */
export async function runSession(options: SessionOptions): Promise<void> {
  const session = startSession(options);
  try {
    await session.finished;
  } finally {
    session.stop();
  }
}
