/**
 * Structured logging
 *
 * A logger is created once at startup and passed to each component that
 * needs one. Nothing is written at import time.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  path?: string;
  source?: string;
  catalog?: string;
  destination?: string;
  entries?: number;
  count?: number;
  match_type?: string;
  error?: string;
  error_stack?: string;
  [key: string]: unknown;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}

export interface Logger {
  debug(tag: string, msg: string, ctx?: LogContext): void;
  info(tag: string, msg: string, ctx?: LogContext): void;
  warn(tag: string, msg: string, ctx?: LogContext): void;
  error(tag: string, msg: string, err?: unknown, ctx?: LogContext): void;
}

export interface LoggerOptions {
  level?: LogLevel;

  /** Receives every entry at or above `level`. Defaults to JSON lines on the console */
  write?: (entry: LogEntry) => void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function writeToConsole(entry: LogEntry): void {
  const output = JSON.stringify(entry);

  if (entry.level === 'error' || entry.level === 'warn') {
    console.error(output);
  } else {
    console.log(output);
  }
}

function errorContext(err: unknown): LogContext {
  if (err instanceof Error) {
    return { error: err.message, error_stack: err.stack };
  }
  if (typeof err === 'string') {
    return { error: err };
  }
  if (err !== undefined && err !== null) {
    return { error: JSON.stringify(err) };
  }
  return {};
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const write = options.write ?? writeToConsole;

  const emit = (level: LogLevel, tag: string, msg: string, ctx?: LogContext): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    write({ ts: new Date().toISOString(), level, tag, msg, ...ctx });
  };

  return {
    debug: (tag, msg, ctx) => emit('debug', tag, msg, ctx),
    info: (tag, msg, ctx) => emit('info', tag, msg, ctx),
    warn: (tag, msg, ctx) => emit('warn', tag, msg, ctx),
    error: (tag, msg, err, ctx) => emit('error', tag, msg, { ...ctx, ...errorContext(err) }),
  };
}

export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
}

/**
 * Logger that keeps every entry in memory
 */
export function createMemoryLogger(level: LogLevel = 'debug'): MemoryLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level, write: (entry) => entries.push(entry) });
  return { ...logger, entries };
}

export const silentLogger: Logger = createLogger({ write: () => undefined });
