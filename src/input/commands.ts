// Command dispatch
// Maps discrete input events (button presses, keystrokes) onto navigator operations

import { describeError } from '../errors.js';
import { type Logger, silentLogger } from '../logging.js';
import type { Navigator } from '../navigator.js';

export type Command = 'up' | 'previous' | 'next' | 'action' | 'refresh' | 'quit' | 'unrecognized';

/**
 * Anything that produces commands: physical buttons, the keyboard
 */
export interface InputSource {
  /** Starts delivering commands to the handler */
  start(onCommand: (command: Command) => void): void;
  /** Stops delivering commands and releases the input */
  stop(): void;
}

export const HELP_TEXT = [
  '^ u 6 : go (U)p the menu tree to the parent menu item',
  '> n . : (N)ext menu item',
  '< p , : (P)revious menu item',
  '* x   : e(X)ecute menu item or drill down into an item (space works too)',
  '<cr>  : update the display',
  'q     : (Q)uit',
].join('\n');

// Key names as reported by terminal-kit
const NAMED_KEYS: Record<string, Command> = {
  UP: 'up',
  LEFT: 'previous',
  RIGHT: 'next',
  ENTER: 'refresh',
  KP_ENTER: 'refresh',
  CTRL_C: 'quit',
};

const CHARACTER_KEYS: Record<string, Command> = {
  '^': 'up',
  u: 'up',
  '6': 'up',
  '<': 'previous',
  p: 'previous',
  ',': 'previous',
  '>': 'next',
  n: 'next',
  '.': 'next',
  '*': 'action',
  x: 'action',
  ' ': 'action',
  q: 'quit',
  '': 'refresh',
};

/**
 * Translates a single keystroke into a command.
 * Letters are matched case-insensitively; named keys (UP, ENTER, ...) exactly.
 */
export function keyToCommand(key: string): Command {
  if (Object.hasOwn(NAMED_KEYS, key)) {
    return NAMED_KEYS[key];
  }
  const lowered = key.toLowerCase();
  if (Object.hasOwn(CHARACTER_KEYS, lowered)) {
    return CHARACTER_KEYS[lowered];
  }
  return 'unrecognized';
}

export interface CommandDispatcherOptions {
  /** Shows the key help after an unrecognized command */
  onHelp?: (text: string) => void;
  logger?: Logger;
}

export class CommandDispatcher {
  private readonly navigator: Navigator;
  private readonly onHelp: (text: string) => void;
  private readonly logger: Logger;

  constructor(navigator: Navigator, options: CommandDispatcherOptions = {}) {
    this.navigator = navigator;
    this.onHelp = options.onHelp ?? (() => undefined);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Applies one command to the navigator
   *
   * @returns true when the command asks the session to end
   */
  async execute(command: Command): Promise<boolean> {
    switch (command) {
      case 'up':
        this.navigator.doUp();
        break;
      case 'previous':
        this.navigator.doPrev();
        break;
      case 'next':
        this.navigator.doNext();
        break;
      case 'action':
        try {
          await this.navigator.doAction();
        } catch (err) {
          this.logger.error(`Action failed: ${describeError(err)}`, err);
        }
        break;
      case 'refresh':
        this.navigator.display();
        break;
      case 'quit':
        this.logger.info('Quit requested');
        return true;
      case 'unrecognized':
        this.onHelp(HELP_TEXT);
        return false;
    }

    this.logger.debug(`${command} -> ${this.navigator.toString()}`);
    return false;
  }
}
