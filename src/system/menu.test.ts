import { beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveText } from '../menu/item.js';
import { MenuTree } from '../menu/tree.js';
import { Navigator } from '../navigator.js';
import type { SystemCommands } from './commands.js';
import type { SystemInfo } from './info.js';
import { buildSystemMenu } from './menu.js';

const info: SystemInfo = {
  hostname: () => 'pi',
  ipAddress: () => '10.0.0.5',
  uptimeSeconds: () => 3_661,
  loadAverage: () => [0.5, 1, 1.234],
  now: () => new Date(2024, 0, 2, 3, 4, 5),
};

function createCommands() {
  return {
    shutdown: vi.fn(async () => undefined),
    reboot: vi.fn(async () => undefined),
    runlevel: vi.fn(async () => 'N 5'),
    serviceStatus: vi.fn(async (name: string) => (name === 'ssh' ? 'active' : 'inactive')),
  } satisfies SystemCommands;
}

describe('menu', () => {
  describe('buildSystemMenu', () => {
    let tree: MenuTree;
    let navigator: Navigator;
    let commands: ReturnType<typeof createCommands>;

    function visible(): [string, string] {
      const item = navigator.peek();
      if (!item) return ['', ''];
      return [resolveText(item.title, navigator), resolveText(item.description, navigator)];
    }

    function start(services: string[]) {
      navigator.push(buildSystemMenu(tree, commands, { services, probeIntervalMs: 0, info }));
    }

    beforeEach(() => {
      tree = new MenuTree();
      navigator = new Navigator(tree);
      commands = createCommands();
    });

    it('should open on Information with the host name', () => {
      start(['ssh']);
      expect(visible()).toEqual(['Information', 'pi']);
      expect(navigator.isRoot).toBe(true);
    });

    it('should ring Information, System and Services at the root', () => {
      start(['ssh', 'nginx']);

      navigator.doNext();
      expect(visible()).toEqual(['System', '']);
      navigator.doNext();
      expect(visible()).toEqual(['Services', '2 configured']);
      navigator.doNext();
      expect(visible()).toEqual(['Information', 'pi']);
    });

    it('should list the host facts under Information', async () => {
      start(['ssh']);
      await navigator.doAction();

      const seen: [string, string][] = [];
      for (let i = 0; i < 5; i++) {
        seen.push(visible());
        navigator.doNext();
      }

      expect(seen).toEqual([
        ['IP Address', '10.0.0.5'],
        ['Time', '03:04:05'],
        ['Date', '2024-01-02'],
        ['Uptime', '01:01:01'],
        ['Load', '0.50 1.00 1.23'],
      ]);
      expect(visible()).toEqual(['IP Address', '10.0.0.5']);
    });

    it('should run shutdown and reboot from the System menu', async () => {
      start(['ssh']);
      navigator.doNext();
      await navigator.doAction();

      expect(visible()).toEqual(['System', 'Shutdown']);
      await navigator.doAction();
      expect(commands.shutdown).toHaveBeenCalledTimes(1);

      navigator.doNext();
      expect(visible()).toEqual(['System', 'Reboot']);
      await navigator.doAction();
      expect(commands.reboot).toHaveBeenCalledTimes(1);
      expect(commands.shutdown).toHaveBeenCalledTimes(1);
    });

    it('should show the run level once it has been read', async () => {
      start(['ssh']);
      navigator.doNext();
      await navigator.doAction();
      navigator.doPrev();

      expect(visible()).toEqual(['Run level', 'Runlevel: ...']);
      await vi.waitFor(() => expect(visible()).toEqual(['Run level', 'Runlevel: N 5']));
    });

    it('should show the state of every configured service', async () => {
      start(['ssh', 'nginx']);
      navigator.doPrev();
      await navigator.doAction();

      await vi.waitFor(() => expect(visible()).toEqual(['ssh', 'active']));
      navigator.doNext();
      await vi.waitFor(() => expect(visible()).toEqual(['nginx', 'inactive']));
      expect(commands.serviceStatus).toHaveBeenCalledWith('nginx');
    });

    it('should show a placeholder item without services', async () => {
      start([]);
      navigator.doPrev();
      expect(visible()).toEqual(['Services', '0 configured']);

      await navigator.doAction();
      expect(visible()).toEqual(['Services', 'none configured']);
      expect(navigator.depth).toBe(2);
    });
  });
});
