/**
 * Logger
 *
 * Built from an explicit options value and handed to whatever needs it.
 * There is no process-wide logger state.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Verbosity count → most detailed level shown */
const VERBOSITY_LEVELS: LogLevel[] = ['warn', 'info', 'debug'];

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LoggerOptions {
  /** 0 = warnings, 1 = info, 2 or more = debug */
  verbosity?: number;
  /** Append every emitted line to this file as well */
  logFile?: string;
  scope?: string;
  /** Clock used for timestamps */
  now?: () => Date;
}

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  child(scope: string): Logger;
}

/**
 * Map a verbosity count to a log level, clamping counts above the highest level
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  const index = Math.min(Math.max(Math.trunc(verbosity), 0), VERBOSITY_LEVELS.length - 1);
  return VERBOSITY_LEVELS[index];
}

export function formatLogLine(date: Date, level: LogLevel, scope: string, message: string): string {
  return `[${date.toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
}

const CONSOLE_SINKS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = levelForVerbosity(options.verbosity ?? 0);
  const scope = options.scope ?? 'framedeck';
  const now = options.now ?? (() => new Date());

  const emit = (lineLevel: LogLevel, message: string): void => {
    if (LEVEL_RANK[lineLevel] > LEVEL_RANK[level]) {
      return;
    }
    const line = formatLogLine(now(), lineLevel, scope, message);
    CONSOLE_SINKS[lineLevel](line);
    if (options.logFile) {
      appendFileSync(options.logFile, `${line}\n`, 'utf-8');
    }
  };

  return {
    level,
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
    child: (childScope) => createLogger({ ...options, scope: `${scope}.${childScope}` }),
  };
}

/**
 * Logger that drops everything (library default when no logger is passed)
 */
export const silentLogger: Logger = {
  level: 'error',
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
  child: () => silentLogger,
};
