/**
 * Leveled logger used by the sync engine and the CLI.
 *
 * Library code takes an optional `Logger` and defaults to `noopLogger`, so
 * nothing is printed unless the caller wires one in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';
export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  data?: LogData;
}

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  level: LogLevel;
  format?: LogFormat;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  time?: () => string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

function shouldLog(configLevel: LogLevel, entryLevel: LogLevel): boolean {
  return LEVEL_ORDER[entryLevel] >= LEVEL_ORDER[configLevel];
}

export function formatTextEntry(entry: LogEntry): string {
  const base = `${entry.timestamp} ${entry.level.toUpperCase()} ${entry.message}`;
  if (!entry.data || Object.keys(entry.data).length === 0) {
    return base;
  }
  return `${base} ${JSON.stringify(entry.data)}`;
}

/**
 * Create a logger that writes one line per entry.
 * warn and error go to `errorOutput` (stderr by default).
 */
export function createLogger(options: LoggerOptions): Logger {
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const time = options.time ?? (() => new Date().toISOString());
  const format = options.format ?? 'text';

  const write = (level: Exclude<LogLevel, 'silent'>, message: string, data?: LogData): void => {
    if (!shouldLog(options.level, level)) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: time() };
    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }

    const line = format === 'json' ? JSON.stringify(entry) : formatTextEntry(entry);
    const stream = level === 'warn' || level === 'error' ? errorOutput : output;
    stream.write(`${line}\n`);
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
