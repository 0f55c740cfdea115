/**
 * Component logger for the converter.
 * Uses console with level filtering; `silent` turns everything off.
 */

import type { LogLevel } from '../types/config.js';

export type { LogLevel };

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLORS: Record<EmittingLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: EmittingLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatMessage(level: EmittingLevel, component: string, message: string): string {
  const timestamp = new Date().toISOString().substring(11, 23);
  const color = LEVEL_COLORS[level];
  const levelTag = level.toUpperCase().padEnd(5);
  return `${RESET}${timestamp} ${color}${levelTag}${RESET} [${component}] ${message}`;
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, data) => {
      if (shouldLog('debug')) {
        console.debug(formatMessage('debug', component, message), data ?? '');
      }
    },
    info: (message, data) => {
      if (shouldLog('info')) {
        console.info(formatMessage('info', component, message), data ?? '');
      }
    },
    warn: (message, data) => {
      if (shouldLog('warn')) {
        console.warn(formatMessage('warn', component, message), data ?? '');
      }
    },
    error: (message, data) => {
      if (shouldLog('error')) {
        console.error(formatMessage('error', component, message), data ?? '');
      }
    },
  };
}

/** Render a caught value for a log line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
