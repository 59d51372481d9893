/**
 * Structured Logging
 *
 * Writes timestamped log entries to ~/.stackmeter/logs/<name>.log.
 * Never throws: logging failures are swallowed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { PATHS } from './paths.js';
import type { LogLevelName } from './types.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_TAGS: Record<LogLevelName, LogLevel> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5 MB

export interface LoggerOptions {
  /** Directory holding <name>.log. Defaults to PATHS.logs */
  dir?: string;
  /** Minimum level written. Defaults to info */
  level?: LogLevelName;
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Render log arguments into one line. Errors keep their stack.
 */
export function formatArgs(args: unknown[]): string {
  return args
    .map(a => {
      if (a instanceof Error) {
        return `${a.name}: ${a.message}${a.stack ? `\n${a.stack}` : ''}`;
      }
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

/**
 * Create a logger for a specific module.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const logPath = path.join(options.dir ?? PATHS.logs, `${name}.log`);
  const minLevel = LEVEL_ORDER[options.level ?? 'info'];

  function rotateIfNeeded(): void {
    try {
      const stats = fs.statSync(logPath);
      if (stats.size >= MAX_LOG_SIZE) {
        // Single rotation: current → .1 (overwrite previous .1)
        fs.renameSync(logPath, `${logPath}.1`);
      }
    } catch {
      // File doesn't exist yet, nothing to rotate
    }
  }

  function log(level: LogLevelName, ...args: unknown[]): void {
    if (LEVEL_ORDER[level] < minLevel) return;
    try {
      const dir = path.dirname(logPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      rotateIfNeeded();

      const timestamp = new Date().toISOString();
      fs.appendFileSync(logPath, `[${timestamp}] [${LEVEL_TAGS[level]}] ${formatArgs(args)}\n`);
    } catch {
      // Logging must never throw.
    }
  }

  return {
    debug: (...args: unknown[]) => log('debug', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    error: (...args: unknown[]) => log('error', ...args),
  };
}
