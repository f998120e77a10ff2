import type { Verbosity } from './types';

let verbosity: Verbosity = 0;

export function setVerbosity(level: Verbosity): void {
  verbosity = level;
}

export function getVerbosity(): Verbosity {
  return verbosity;
}

function logWith(method: 'log' | 'warn' | 'error', args: unknown[]): void {
  console[method](...args);
}

export const logger = {
  /**
   * Per-query detail, shown at verbosity 2
   */
  trace(...args: unknown[]): void {
    if (verbosity < 2) {
      return;
    }
    logWith('log', args);
  },
  /**
   * Progress output, shown at verbosity 1 and above
   */
  debug(...args: unknown[]): void {
    if (verbosity < 1) {
      return;
    }
    logWith('log', args);
  },
  info(...args: unknown[]): void {
    logWith('log', args);
  },
  warn(...args: unknown[]): void {
    logWith('warn', args);
  },
  error(...args: unknown[]): void {
    logWith('error', args);
  },
};
