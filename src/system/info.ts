// Local system facts shown in the Information menu

import * as os from 'node:os';

export interface SystemInfo {
  hostname(): string;
  /** Primary IPv4 address */
  ipAddress(): string;
  uptimeSeconds(): number;
  /** 1, 5 and 15 minute load averages */
  loadAverage(): number[];
  now(): Date;
}

const LOOPBACK_ADDRESS = '127.0.0.1';

type InterfaceTable = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

/**
 * First external IPv4 address, assuming a simple network (one address on
 * one interface, no bridging); the loopback address when there is none.
 */
export function primaryIPv4(interfaces: InterfaceTable): string {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }
  return LOOPBACK_ADDRESS;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** HH:MM:SS in local time */
export function formatTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** YYYY-MM-DD in local time */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/**
 * "HH:MM:SS" under a day, "Nd HH:MM" beyond
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  const minutes = Math.floor((seconds % 3_600) / 60);

  if (days > 0) {
    return `${days}d ${pad2(hours)}:${pad2(minutes)}`;
  }
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds % 60)}`;
}

export function formatLoad(load: readonly number[]): string {
  return load
    .slice(0, 3)
    .map((value) => value.toFixed(2))
    .join(' ');
}

export const nodeSystemInfo: SystemInfo = {
  hostname: () => os.hostname().split('.')[0],
  ipAddress: () => primaryIPv4(os.networkInterfaces()),
  uptimeSeconds: () => os.uptime(),
  loadAverage: () => os.loadavg(),
  now: () => new Date(),
};
