/**
 * Logger: tagged console output filtered by `runtime.logLevel`.
 *
 * Every subsystem gets its own tag (`[Circuit]`, `[Fact]`, ...). The level is
 * shared process-wide and set once from the validated config at startup.
 */

import type { LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let activeLevel: LogLevel = 'info';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  readonly tag: string;
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    tag,

    debug(message: string, ...details: unknown[]): void {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },

    info(message: string, ...details: unknown[]): void {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },

    warn(message: string, ...details: unknown[]): void {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },

    error(message: string, ...details: unknown[]): void {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
