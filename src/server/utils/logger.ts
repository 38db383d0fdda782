/**
 * Scoped console logger
 * Prefixes every line with [Scope] and survives a closed stdout (EPIPE)
 */

import type { LogLevel } from '../../config/env';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isBrokenPipe(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  return code === 'EPIPE' || error.message === 'write EPIPE';
}

// Safe logging that won't crash on EPIPE (broken pipe)
function safeWrite(write: (...args: unknown[]) => void, args: unknown[]): void {
  try {
    write(...args);
  } catch (error) {
    if (!isBrokenPipe(error)) {
      throw error;
    }
  }
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  const emit = (level: LogLevel, write: (...args: unknown[]) => void, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    safeWrite(write, [`${prefix} ${message}`, ...details]);
  };

  return {
    debug: (message, ...details) => emit('debug', console.debug, message, details),
    info: (message, ...details) => emit('info', console.log, message, details),
    warn: (message, ...details) => emit('warn', console.warn, message, details),
    error: (message, ...details) => emit('error', console.error, message, details),
  };
}
