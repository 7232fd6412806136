/**
 * @fileoverview Logging types
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LogContext {
  component?: string;
  conversationId?: string;
  [key: string]: unknown;
}

/**
 * The logging sink every component receives. TitlecastLogger implements it;
 * tests substitute a recording fake.
 */
export interface Logger {
  child(context: LogContext): Logger;
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | Record<string, unknown>): void;
  timed<T>(label: string, fn: () => Promise<T>): Promise<T>;
}
