// The system menu shown at startup
//
//   Information (host name)    IP Address, Time, Date, Uptime, Load
//   System                     Shutdown, Reboot, Run level
//   Services (n configured)    one item per configured service unit

import type { Logger } from '../logging.js';
import type { MenuItemId } from '../menu/item.js';
import type { MenuTree } from '../menu/tree.js';
import type { SystemCommands } from './commands.js';
import {
  formatDate,
  formatLoad,
  formatTime,
  formatUptime,
  nodeSystemInfo,
  type SystemInfo,
} from './info.js';
import { StatusProbe } from './probe.js';

export interface SystemMenuOptions {
  /** Service unit names listed under Services */
  services: readonly string[];
  /** Minimum time between two runs of the same status command */
  probeIntervalMs: number;
  logger?: Logger;
  info?: SystemInfo;
}

/**
 * Builds the system menu into the tree and returns the root item
 */
export function buildSystemMenu(
  tree: MenuTree,
  commands: SystemCommands,
  options: SystemMenuOptions,
): MenuItemId {
  const info = options.info ?? nodeSystemInfo;
  const probe = (read: () => Promise<string>) =>
    new StatusProbe(read, { minIntervalMs: options.probeIntervalMs, logger: options.logger });

  const information = tree.link(
    tree.item('Information', () => info.hostname()),
    tree.item('IP Address', () => info.ipAddress()),
    tree.item('Time', () => formatTime(info.now())),
    tree.item('Date', () => formatDate(info.now())),
    tree.item('Uptime', () => formatUptime(info.uptimeSeconds())),
    tree.item('Load', () => formatLoad(info.loadAverage())),
  );

  const runlevel = probe(() => commands.runlevel());
  const system = tree.link(
    tree.item('System', ''),
    tree.item('System', 'Shutdown', { action: () => commands.shutdown() }),
    tree.item('System', 'Reboot', { action: () => commands.reboot() }),
    tree.item('Run level', () => `Runlevel: ${runlevel.current()}`),
  );

  const serviceItems = options.services.map((name) => {
    const status = probe(() => commands.serviceStatus(name));
    return tree.item(name, () => status.current());
  });
  const [firstService, ...otherServices] =
    serviceItems.length > 0 ? serviceItems : [tree.item('Services', 'none configured')];
  const services = tree.link(
    tree.item('Services', `${options.services.length} configured`),
    firstService,
    ...otherServices,
  );

  return tree.link(null, information, system, services);
}
