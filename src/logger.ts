/**
 * Level-based logger for the gateway.
 * Writes to stderr so stdout stays free for piping; never logs secrets.
 */

import type { LogLevel } from './config.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

let currentLevel: LogLevel = 'INFO';

/** Set the minimum log level. Messages below it are dropped. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMessage(level: LogLevel, scope: string | undefined, msg: string, data?: unknown): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${ts}] [${level}] [${scope}]` : `[${ts}] [${level}]`;
  if (data !== undefined) {
    return `${prefix} ${msg} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${msg}`;
}

function describeError(err: unknown): unknown {
  if (err instanceof Error) {
    return { message: err.message, stack: err.stack };
  }
  return err !== undefined ? String(err) : undefined;
}

function write(level: LogLevel, scope: string | undefined, msg: string, data?: unknown): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, scope, msg, data));
  }
}

export function info(msg: string, data?: unknown): void {
  write('INFO', undefined, msg, data);
}

export function warn(msg: string, data?: unknown): void {
  write('WARN', undefined, msg, data);
}

/** Log an ERROR-level message with the error's message and stack. */
export function error(msg: string, err?: unknown): void {
  const detail = describeError(err);
  write('ERROR', undefined, msg, detail !== undefined ? { error: detail } : undefined);
}

export interface ScopedLogger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, err?: unknown): void;
}

/** Logger whose lines carry a `[scope]` tag, e.g. `http` or `pinecone`. */
export function scoped(scope: string): ScopedLogger {
  return {
    debug: (msg, data) => write('DEBUG', scope, msg, data),
    info: (msg, data) => write('INFO', scope, msg, data),
    warn: (msg, data) => write('WARN', scope, msg, data),
    error: (msg, err) => {
      const detail = describeError(err);
      write('ERROR', scope, msg, detail !== undefined ? { error: detail } : undefined);
    },
  };
}
