#!/usr/bin/env node

// Main entry point for lcdmenu
// Loads configuration, opens the display and buttons, and runs the menu session

import fs from 'node:fs';
import { type Config, loadConfig, resolveConfigPath } from './config.js';
import type { DisplayDevice } from './display/device.js';
import { loadButtonDriver, loadDisplayDriver } from './drivers.js';
import { DisplayUnavailableError, describeError } from './errors.js';
import { createButtonInput } from './input/buttons.js';
import type { InputSource } from './input/commands.js';
import { createFileLogger, type Logger, startLogSession } from './logging.js';
import { runSession } from './session.js';
import { createSystemCommands } from './system/commands.js';
import { buildSystemMenu } from './system/menu.js';
import { createKeyboardInput } from './tui/keyboard.js';
import { TerminalDisplay } from './tui/terminal-display.js';

/**
 * Get package.json version
 */
function getVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
lcdmenu - System control menu on a two-line character display

  Shows host information, system controls and service status on a
  character LCD driven by four buttons. Without a display driver the
  panel is drawn in the terminal and driven from the keyboard.

USAGE
  lcdmenu [options]

OPTIONS
  -h, --help         Show this help message
  -v, --version      Show version number
  --config <file>    Read configuration from a JSON file (default: $LCDMENU_CONFIG)
  --service          Refuse to run unless the configured display driver loads

EXAMPLES
  lcdmenu                               Run in the terminal
  lcdmenu --config /etc/lcdmenu.json    Run with the configured LCD and buttons
`);
}

interface CliArgs {
  help: boolean;
  version: boolean;
  service: boolean;
  configPath: string | null;
}

function parseArgs(args: string[]): CliArgs {
  const configIndex = args.indexOf('--config');
  const configPath = configIndex >= 0 ? (args[configIndex + 1] ?? null) : null;

  if (configIndex >= 0 && configPath === null) {
    throw new Error('--config needs a file path');
  }

  return {
    help: args.includes('--help') || args.includes('-h'),
    version: args.includes('--version') || args.includes('-v'),
    service: args.includes('--service'),
    configPath,
  };
}

interface OpenedDisplay {
  device: DisplayDevice;
  terminal: TerminalDisplay | null;
}

/**
 * Opens the configured display driver, falling back to the terminal.
 * In service mode a missing display is fatal.
 */
async function openDisplay(config: Config, service: boolean, logger: Logger): Promise<OpenedDisplay> {
  const { rows, cols, driver } = config.display;

  if (driver) {
    try {
      const device = await loadDisplayDriver(driver, { rows, cols });
      logger.info(`Display driver "${driver}" opened (${device.rows}x${device.cols})`);
      return { device, terminal: null };
    } catch (err) {
      if (service || !(err instanceof DisplayUnavailableError)) throw err;
      logger.warn(`${err.message}; using the terminal instead`);
    }
  } else if (service) {
    throw new DisplayUnavailableError('No display driver configured (display.driver)');
  }

  const terminal = new TerminalDisplay({ rows, cols });
  terminal.open();
  return { device: terminal, terminal };
}

async function openInputs(
  config: Config,
  terminal: TerminalDisplay | null,
  logger: Logger,
): Promise<InputSource[]> {
  const inputs: InputSource[] = [];

  if (config.buttons.driver) {
    try {
      const driver = await loadButtonDriver(config.buttons.driver);
      inputs.push(createButtonInput(driver, config.buttons));
      logger.info(`Button driver "${config.buttons.driver}" bound`);
    } catch (err) {
      logger.error(`Button driver unavailable: ${describeError(err)}`, err);
    }
  }

  if (terminal) {
    inputs.push(createKeyboardInput());
  }

  return inputs;
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  let display: OpenedDisplay | null = null;

  try {
    const args = parseArgs(process.argv.slice(2));

    if (args.help) {
      printHelp();
      return;
    }

    if (args.version) {
      console.log(getVersion());
      return;
    }

    const config = loadConfig(resolveConfigPath(args.configPath));

    startLogSession(config.logFile);
    const logger = createFileLogger(config.logFile, config.logLevel);

    display = await openDisplay(config, args.service, logger);
    const terminal = display.terminal;
    const inputs = await openInputs(config, terminal, logger);
    const commands = createSystemCommands();

    await runSession({
      device: display.device,
      inputs,
      buildMenu: (tree) =>
        buildSystemMenu(tree, commands, {
          services: config.services,
          probeIntervalMs: config.probeIntervalMs,
          logger,
        }),
      backlightDelayMs: config.backlightDelayMs,
      defaultRefreshRate: config.defaultRefreshRate,
      mergeGap: config.display.mergeGap,
      onHelp: (text) => {
        if (terminal) {
          terminal.showMessage(text);
        } else {
          logger.info(text);
        }
      },
      logger,
      handleSignals: true,
    });

    process.exit(0);
  } catch (error) {
    // Restore the terminal before reporting
    display?.device.close?.();
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exit(1);
  }
}

// Self-executing entry point
void main();
