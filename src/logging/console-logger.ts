/**
 * Console Logger - level-filtered `[prefix] message` output.
 *
 * Used by the CLI, which hands it the container's console; library callers
 * pass their own Logger or get the silent one.
 */

import type { LogLevel, LogSink, Logger } from './logger';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info',
    private readonly sink: LogSink = console
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, [context]);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, [context]);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, [context]);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, [error, context]);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) {
      return;
    }
    const args = [`[${this.prefix}] ${message}`, ...details.filter(detail => detail !== undefined)];
    if (level === 'warn' || level === 'error') {
      this.sink.error(...args);
    } else {
      this.sink.log(...args);
    }
  }
}
