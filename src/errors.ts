// Error types surfaced at startup
// Everything else in the menu core is total: navigation never throws

/**
 * No usable display device: the configured driver module is missing,
 * fails to load, or does not produce a device.
 */
export class DisplayUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DisplayUnavailableError';
  }
}

/**
 * Configuration file could not be read or did not validate
 */
export class ConfigError extends Error {
  /** One entry per failing path, e.g. "display.cols: Expected number, received string" */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Best-effort message extraction for logs and stderr
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
