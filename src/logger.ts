/**
 * Centralized logging with per-module context and an optional log file
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel | Uppercase<LogLevel>;
}

export interface LogSinkOptions {
  level?: LogLevel;
  file?: string | null;
  useColors?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',    // Cyan
  info: '\x1b[32m',     // Green
  warn: '\x1b[33m',     // Yellow
  error: '\x1b[31m'     // Red
};
const RESET = '\x1b[0m';

/**
 * Process-wide sink settings. Individual loggers only carry their context
 * and an optional level override.
 */
const sink: { level?: LogLevel; file: string | null; useColors: boolean; history: LogEntry[] } = {
  level: undefined,
  file: null,
  useColors: true,
  history: [],
};

const MAX_HISTORY = 1000;

export class Logger {
  private context?: string;
  private minLevel?: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.minLevel = parseLevel(options.level);
  }

  /**
   * Apply the `logging` section of the configuration to every logger.
   */
  static configure(options: LogSinkOptions): void {
    if (options.level !== undefined) sink.level = options.level;
    if (options.file !== undefined) sink.file = options.file;
    if (options.useColors !== undefined) sink.useColors = options.useColors;
  }

  private effectiveLevel(): LogLevel {
    return this.minLevel ?? sink.level ?? parseLevel(process.env.LOG_LEVEL) ?? 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.effectiveLevel());
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private writeFile(formatted: string): void {
    if (!sink.file) return;
    try {
      mkdirSync(dirname(sink.file), { recursive: true });
      appendFileSync(sink.file, formatted + '\n');
    } catch (error) {
      // Fall back to the console only; a broken log file must not break the operation.
      sink.file = null;
      console.error(`Failed to write log file: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    sink.history.push(entry);
    if (sink.history.length > MAX_HISTORY) {
      sink.history = sink.history.slice(-MAX_HISTORY);
    }

    const formatted = this.formatMessage(entry);
    const line = sink.useColors ? `${COLORS[entry.level]}${formatted}${RESET}` : formatted;

    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }

    this.writeFile(formatted);
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      data,
      context: this.context
    });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    const own = sink.history.filter(entry => !this.context || entry.context === this.context);
    return level ? own.filter(entry => entry.level === level) : own;
  }

  clear(): void {
    sink.history = sink.history.filter(entry => this.context && entry.context !== this.context);
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Default instance for call sites without a module of their own
export const logger = new Logger({ context: 'file-organizer' });
