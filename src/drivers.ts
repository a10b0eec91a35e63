/**
 * Hardware driver plugins
 *
 * Character LCD and GPIO access live outside this package. A driver is an
 * ES module named in the configuration that exports a factory:
 *
 *   export function createDisplay(options: { rows: number; cols: number }): DisplayDevice
 *   export function createButtons(): ButtonDriver
 *
 * Factories may be async.
 */

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { type DisplayDevice, isDisplayDevice } from './display/device.js';
import { DisplayUnavailableError, describeError } from './errors.js';
import { type ButtonDriver, isButtonDriver } from './input/buttons.js';

export interface DisplayDriverOptions {
  rows: number;
  cols: number;
}

/** Imports a module; swapped out in tests */
export type ModuleImporter = (specifier: string) => Promise<unknown>;

/**
 * File paths are taken relative to the working directory; anything else
 * is resolved as a package name.
 */
export function resolveSpecifier(specifier: string, cwd: string = process.cwd()): string {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

const importModule: ModuleImporter = (specifier) => import(resolveSpecifier(specifier));

async function loadFactory(
  specifier: string,
  exportName: string,
  importer: ModuleImporter,
): Promise<(...args: unknown[]) => unknown> {
  const mod = await importer(specifier);

  if (typeof mod !== 'object' || mod === null || !(exportName in mod)) {
    throw new Error(`module "${specifier}" does not export ${exportName}()`);
  }

  const factory: unknown = Reflect.get(mod, exportName);
  if (typeof factory !== 'function') {
    throw new Error(`export ${exportName} of "${specifier}" is not a function`);
  }

  return (...args: unknown[]) => Reflect.apply(factory, mod, args);
}

/**
 * Loads a display driver and opens the device
 *
 * @throws DisplayUnavailableError when the module, its factory or the device is missing
 */
export async function loadDisplayDriver(
  specifier: string,
  options: DisplayDriverOptions,
  importer: ModuleImporter = importModule,
): Promise<DisplayDevice> {
  let device: unknown;
  try {
    const createDisplay = await loadFactory(specifier, 'createDisplay', importer);
    device = await createDisplay(options);
  } catch (err) {
    throw new DisplayUnavailableError(
      `Cannot open display driver "${specifier}": ${describeError(err)}`,
      { cause: err },
    );
  }

  if (!isDisplayDevice(device)) {
    throw new DisplayUnavailableError(
      `Display driver "${specifier}" did not return a display device`,
    );
  }
  return device;
}

/**
 * Loads a button driver
 */
export async function loadButtonDriver(
  specifier: string,
  importer: ModuleImporter = importModule,
): Promise<ButtonDriver> {
  const createButtons = await loadFactory(specifier, 'createButtons', importer);
  const driver = await createButtons();

  if (!isButtonDriver(driver)) {
    throw new Error(`Button driver "${specifier}" did not return a button driver`);
  }
  return driver;
}
