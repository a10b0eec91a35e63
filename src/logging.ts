/**
 * Debug logging
 *
 * Appends timestamped lines to a log file. The file is truncated with a
 * session header on startup so it only ever holds the current run.
 * Write failures are dropped: a full disk must not take the menu down.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(text: string, details?: unknown): void;
  info(text: string, details?: unknown): void;
  warn(text: string, details?: unknown): void;
  error(text: string, details?: unknown): void;
}

/**
 * Logger that discards everything (tests, library use)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

function serializeDetails(details: unknown): unknown {
  if (details instanceof Error) {
    return { name: details.name, message: details.message, stack: details.stack };
  }
  return details;
}

/**
 * Formats one log entry, including the trailing newline.
 * Details are rendered as indented JSON below the message.
 */
export function formatLogLine(
  level: LogLevel,
  text: string,
  details?: unknown,
  now: Date = new Date(),
): string {
  let line = `[${now.toISOString()}] [${level.toUpperCase()}] ${text}`;

  if (details !== undefined) {
    const json = JSON.stringify(serializeDetails(details), null, 2) ?? String(details);
    line += `\n    DETAILS: ${json.split('\n').join('\n    ')}`;
  }

  return `${line}\n`;
}

function ensureDirectory(filePath: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Truncates the log file and writes the session header
 */
export function startLogSession(filePath: string, now: Date = new Date()): void {
  try {
    ensureDirectory(filePath);
    fs.writeFileSync(filePath, `=== lcdmenu session ${now.toISOString()} ===\n\n`);
  } catch {
    // Logging is best-effort
  }
}

/**
 * Creates a logger appending to filePath, dropping entries below minLevel
 */
export function createFileLogger(filePath: string, minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[minLevel];

  function write(level: LogLevel, text: string, details?: unknown): void {
    if (LEVEL_ORDER[level] < threshold) return;

    try {
      ensureDirectory(filePath);
      fs.appendFileSync(filePath, formatLogLine(level, text, details), 'utf8');
    } catch {
      // If we can't write, just continue
    }
  }

  return {
    debug: (text, details) => write('debug', text, details),
    info: (text, details) => write('info', text, details),
    warn: (text, details) => write('warn', text, details),
    error: (text, details) => write('error', text, details),
  };
}
