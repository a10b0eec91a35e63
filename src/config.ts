/**
 * Configuration
 *
 * Optional JSON file merged over defaults and validated with zod. The file
 * comes from --config, else the LCDMENU_CONFIG environment variable.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

const PinSchema = z.number().int().min(0);

const DisplayConfigSchema = z.object({
  rows: z.number().int().min(1).max(4).default(2),
  cols: z.number().int().min(1).max(40).default(16),
  /** Module exporting createDisplay(); the terminal is used without one */
  driver: z.string().min(1).optional(),
  /** Unchanged characters merged into a single write on flush */
  mergeGap: z.number().int().min(0).default(3),
});

const ButtonConfigSchema = z.object({
  up: PinSchema.default(5),
  previous: PinSchema.default(6),
  next: PinSchema.default(12),
  action: PinSchema.default(13),
  /** Module exporting createButtons(); buttons are not bound without one */
  driver: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  display: DisplayConfigSchema.default({}),
  buttons: ButtonConfigSchema.default({}),
  backlightDelayMs: z.number().int().positive().default(30_000),
  /** Redraws per second of items that do not set their own rate */
  defaultRefreshRate: z.number().min(0).max(50).default(2),
  services: z.array(z.string().min(1)).default(['ssh']),
  probeIntervalMs: z.number().int().min(0).default(5_000),
  logFile: z.string().min(1).default(() => path.join(process.cwd(), '.lcdmenu', 'debug.log')),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Environment variable naming the configuration file */
export const CONFIG_ENV_VAR = 'LCDMENU_CONFIG';

/**
 * Picks the configuration file: the CLI flag wins over the environment
 */
export function resolveConfigPath(
  cliPath: string | null,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  return cliPath ?? (env[CONFIG_ENV_VAR] || null);
}

/**
 * Validates raw configuration (already parsed JSON) and fills in defaults
 *
 * @throws ConfigError listing every failing path
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Loads the configuration file, or the defaults when there is none
 */
export function loadConfig(filePath: string | null): Config {
  if (filePath === null) {
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${filePath}: ${describeError(err)}`, [], {
      cause: err,
    });
  }
  return parseConfig(raw);
}
