// OS commands behind the System and Services menus

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 10_000;

/**
 * System control capability used by menu actions and status items
 */
export interface SystemCommands {
  shutdown(): Promise<void>;
  reboot(): Promise<void>;
  /** Output of /sbin/runlevel, e.g. "N 5" */
  runlevel(): Promise<string>;
  /** Unit state as reported by systemd: active, inactive, failed, ... */
  serviceStatus(name: string): Promise<string>;
}

/** Runs a command and resolves with its trimmed stdout */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

/**
 * stdout captured on a failed execFile call, if any
 */
function stdoutOf(error: unknown): string | null {
  if (error instanceof Error && 'stdout' in error && typeof error.stdout === 'string') {
    return error.stdout;
  }
  return null;
}

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], {
    timeout: COMMAND_TIMEOUT_MS,
    encoding: 'utf8',
  });
  return stdout.trim();
};

export function createSystemCommands(run: CommandRunner = runCommand): SystemCommands {
  return {
    async shutdown() {
      await run('shutdown', ['now']);
    },

    async reboot() {
      await run('reboot', ['now']);
    },

    runlevel() {
      return run('/sbin/runlevel', []);
    },

    async serviceStatus(name) {
      try {
        return await run('systemctl', ['is-active', name]);
      } catch (err) {
        // is-active exits non-zero for every state except "active" but still reports it
        const stdout = stdoutOf(err)?.trim();
        if (stdout) return stdout;
        throw err;
      }
    },
  };
}
