import type { LogLevel, Logger, OutputSink } from './types.js';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Destination for log lines
   * Default: process.stderr
   */
  stream?: OutputSink;
  prefix?: string;
}

/**
 * Create the default line logger
 *
 * Each call writes `[PREFIX LEVEL] message {meta}` when the level is enabled.
 * Logs go to stderr so step output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream || process.stderr;
  const prefix = options.prefix || 'OPSFLOW';
  const currentLevel = LOG_LEVELS.indexOf(options.level || 'warn');

  const write = (level: LogLevel, msg: string, meta?: unknown) => {
    if (LOG_LEVELS.indexOf(level) > currentLevel) return;
    const suffix = meta === undefined ? '' : ` ${stringify(meta)}`;
    stream.write(`[${prefix} ${level.toUpperCase()}] ${msg}${suffix}\n`);
  };

  return {
    error: (msg: string, meta?: unknown) => write('error', msg, meta),
    warn: (msg: string, meta?: unknown) => write('warn', msg, meta),
    info: (msg: string, meta?: unknown) => write('info', msg, meta),
    debug: (msg: string, meta?: unknown) => write('debug', msg, meta),
  };
}

/**
 * Map a `-v` count to a log level (0 warn, 1 info, 2+ debug)
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function stringify(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
