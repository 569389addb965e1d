/**
 * Module: log
 *
 * Level-gated console logger with tags.
 * - `Logger` formats one line per record and prints it to the console
 * - `log` default instance and `createLogger(tag)` helper
 */
import { inspect } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  tag?: string;
  error?: {
    name?: string;
    message?: string;
    stack?: string;
  };
  extra?: unknown[];
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MAX_LOG_LINE_CHARS = 3 * 1024;

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function resolveDefaultLevel(): LogLevel {
  const envLevel = (process.env.TURNSTACK_LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'dev' ? 'debug' : 'info';
}

let defaultLevel: LogLevel = resolveDefaultLevel();

/** Level for every logger created without an explicit one, including existing ones. */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

function nowTsStr(): string {
  const d = new Date();
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`
  );
}

function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  const signal = `...[truncated ${value.length - maxChars} chars]`;
  if (maxChars <= signal.length) return value.slice(0, maxChars);
  return value.slice(0, maxChars - signal.length) + signal;
}

function inspectValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return inspect(value, { depth: 4, breakLength: Infinity, maxArrayLength: 40, maxStringLength: 512 });
}

export function extractErrorDetails(error: Error | unknown): {
  name?: string;
  message?: string;
  stack?: string;
} {
  if (error instanceof Error) {
    const details: { name?: string; message?: string; stack?: string } = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) {
      const cause = extractErrorDetails(error.cause);
      details.stack = `${details.stack ?? details.message ?? ''}\nCaused by: ${cause.stack ?? cause.message ?? ''}`;
    }
    return details;
  }
  if (typeof error === 'object' && error !== null) {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : undefined;
    const message =
      'message' in error && typeof error.message === 'string' ? error.message : inspectValue(error);
    return { name, message };
  }
  return { message: String(error) };
}

export class Logger {
  private readonly tag?: string;
  private readonly level?: LogLevel;

  constructor(tag?: string, level?: LogLevel) {
    this.tag = tag;
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? defaultLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.getLevel()];
  }

  private formatRecord(
    level: LogLevel,
    message: string,
    error: Error | unknown,
    extra: unknown[],
  ): LogRecord {
    const record: LogRecord = { timestamp: nowTsStr(), level, message, tag: this.tag };
    if (error !== undefined && error !== null) {
      record.error = extractErrorDetails(error);
    }
    if (extra.length > 0) {
      record.extra = extra;
    }
    return record;
  }

  private formatLine(record: LogRecord): string {
    let line = `[${record.timestamp}] ${record.tag ? `[${record.tag}] ` : ''}${record.level.toUpperCase()}: ${record.message}`;
    if (record.error) {
      if (record.error.stack) {
        line += `\n${record.error.stack}`;
      } else if (record.error.message) {
        const plain =
          record.error.name && record.error.message !== record.error.name
            ? `${record.error.name}: ${record.error.message}`
            : record.error.message;
        line += ` Error: ${plain}`;
      }
    }
    if (record.extra && record.extra.length > 0) {
      line += ` Extra: ${record.extra.map(inspectValue).join('; ')}`;
    }
    return truncateText(line, MAX_LOG_LINE_CHARS);
  }

  private log(
    level: LogLevel,
    message: string,
    error?: Error | unknown,
    ...extraData: unknown[]
  ): void {
    if (!this.shouldLog(level)) return;
    const line = this.formatLine(this.formatRecord(level, message, error, extraData));
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  debug(message: string, error?: Error | unknown, ...extraData: unknown[]): void {
    this.log('debug', message, error, ...extraData);
  }

  info(message: string, error?: Error | unknown, ...extraData: unknown[]): void {
    this.log('info', message, error, ...extraData);
  }

  warn(message: string, error?: Error | unknown, ...extraData: unknown[]): void {
    this.log('warn', message, error, ...extraData);
  }

  error(message: string, error?: Error | unknown, ...extraData: unknown[]): void {
    this.log('error', message, error, ...extraData);
  }
}

export const log = new Logger();
export function createLogger(tag: string): Logger {
  return new Logger(tag);
}
