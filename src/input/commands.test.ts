import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Logger } from '../logging.js';
import { MenuTree } from '../menu/tree.js';
import { Navigator } from '../navigator.js';
import { CommandDispatcher, HELP_TEXT, keyToCommand } from './commands.js';

describe('commands', () => {
  describe('keyToCommand', () => {
    it('should map the up keys', () => {
      for (const key of ['UP', '^', 'u', 'U', '6']) {
        expect(keyToCommand(key)).toBe('up');
      }
    });

    it('should map the previous and next keys', () => {
      for (const key of ['LEFT', '<', 'p', 'P', ',']) {
        expect(keyToCommand(key)).toBe('previous');
      }
      for (const key of ['RIGHT', '>', 'n', 'N', '.']) {
        expect(keyToCommand(key)).toBe('next');
      }
    });

    it('should map the action keys', () => {
      for (const key of ['*', 'x', 'X', ' ']) {
        expect(keyToCommand(key)).toBe('action');
      }
    });

    it('should map Enter to refresh and q or Ctrl-C to quit', () => {
      expect(keyToCommand('ENTER')).toBe('refresh');
      expect(keyToCommand('KP_ENTER')).toBe('refresh');
      expect(keyToCommand('')).toBe('refresh');
      expect(keyToCommand('q')).toBe('quit');
      expect(keyToCommand('Q')).toBe('quit');
      expect(keyToCommand('CTRL_C')).toBe('quit');
    });

    it('should report anything else as unrecognized', () => {
      expect(keyToCommand('z')).toBe('unrecognized');
      expect(keyToCommand('F1')).toBe('unrecognized');
      expect(keyToCommand('up')).toBe('unrecognized');
    });
  });

  describe('CommandDispatcher', () => {
    let tree: MenuTree;
    let navigator: Navigator;
    let show: ReturnType<typeof vi.fn>;
    let touch: ReturnType<typeof vi.fn>;
    let logger: Logger & { error: ReturnType<typeof vi.fn>; info: ReturnType<typeof vi.fn> };
    let a: number;
    let b: number;

    beforeEach(() => {
      tree = new MenuTree();
      a = tree.item('A', '');
      b = tree.item('B', '', {
        action: () => {
          throw new Error('command failed');
        },
      });
      tree.link(null, a, b);

      show = vi.fn();
      touch = vi.fn();
      navigator = new Navigator(tree, { show, touch });
      navigator.push(a);
      show.mockClear();
      logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    });

    it('should move through the ring', async () => {
      const dispatcher = new CommandDispatcher(navigator, { logger });

      await expect(dispatcher.execute('next')).resolves.toBe(false);
      expect(navigator.peek()?.id).toBe(b);

      await dispatcher.execute('previous');
      expect(navigator.peek()?.id).toBe(a);
    });

    it('should log the breadcrumb after a navigation command', async () => {
      const dispatcher = new CommandDispatcher(navigator, { logger });
      await dispatcher.execute('next');

      expect(logger.debug).toHaveBeenCalledWith('next -> Menu: B');
    });

    it('should touch on up at the root', async () => {
      const dispatcher = new CommandDispatcher(navigator);
      await dispatcher.execute('up');

      expect(touch).toHaveBeenCalledTimes(1);
      expect(show).not.toHaveBeenCalled();
    });

    it('should redraw on refresh', async () => {
      const dispatcher = new CommandDispatcher(navigator);
      await dispatcher.execute('refresh');

      expect(show).toHaveBeenCalledTimes(1);
    });

    it('should log a failing action and carry on', async () => {
      const dispatcher = new CommandDispatcher(navigator, { logger });
      navigator.swap(b);

      await expect(dispatcher.execute('action')).resolves.toBe(false);
      expect(logger.error).toHaveBeenCalledWith('Action failed: command failed', expect.any(Error));
      expect(navigator.peek()?.id).toBe(b);
    });

    it('should ask to end the session on quit', async () => {
      const dispatcher = new CommandDispatcher(navigator, { logger });

      await expect(dispatcher.execute('quit')).resolves.toBe(true);
      expect(logger.info).toHaveBeenCalledWith('Quit requested');
    });

    it('should show the key help for an unrecognized command without touching the display', async () => {
      const onHelp = vi.fn();
      const dispatcher = new CommandDispatcher(navigator, { onHelp });

      await expect(dispatcher.execute('unrecognized')).resolves.toBe(false);
      expect(onHelp).toHaveBeenCalledWith(HELP_TEXT);
      expect(show).not.toHaveBeenCalled();
      expect(touch).not.toHaveBeenCalled();
    });
  });
});
