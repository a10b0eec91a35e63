// Keyboard input for the terminal display
// One keystroke is one command; terminal-kit delivers keys without Enter

import termKit from 'terminal-kit';
import { type InputSource, keyToCommand } from '../input/commands.js';

const term = termKit.terminal;

export function createKeyboardInput(): InputSource {
  let keyHandler: ((key: string) => void) | null = null;

  return {
    start(onCommand) {
      if (keyHandler) return;

      keyHandler = (key: string) => onCommand(keyToCommand(key));
      term.grabInput(true);
      term.on('key', keyHandler);
    },

    stop() {
      if (!keyHandler) return;

      term.off('key', keyHandler);
      keyHandler = null;
      term.grabInput(false);
    },
  };
}
