/**
 * @fileoverview Structured logging for titlecast
 *
 * Uses pino with:
 * - Configurable log levels
 * - Pretty printing to stderr for interactive use
 * - JSON output when pretty printing is off
 * - Context-aware child loggers
 *
 * Everything goes to stderr so stdout stays reserved for titles.
 */

import pino from 'pino';
import type { LogContext, LogLevel, Logger } from './types.js';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /** Explicit destination; overrides pretty printing */
  destination?: pino.DestinationStream;
}

// =============================================================================
// Logger Factory
// =============================================================================

function createPinoLogger(options: LoggerOptions): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    name: options.name ?? 'titlecast',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      // Applied to child bindings too, so keep everything but the hostname
      bindings: ({ hostname: _hostname, ...rest }) => rest,
    },
  };

  if (options.destination) {
    return pino(pinoOptions, options.destination);
  }

  if (options.pretty ?? true) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,name',
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

// =============================================================================
// Logger Wrapper Class
// =============================================================================

export class TitlecastLogger implements Logger {
  private readonly pino: pino.Logger;
  private readonly context: LogContext;

  /**
   * @param instance Existing pino logger to wrap; child loggers share the parent transport
   */
  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  child(context: LogContext): TitlecastLogger {
    return new TitlecastLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  get bindings(): LogContext {
    return { ...this.context };
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  /**
   * Run fn and log its duration at debug level
   */
  async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.debug(`${label} completed`, { durationMs: (performance.now() - start).toFixed(2) });
      return result;
    } catch (error) {
      this.debug(`${label} failed`, { durationMs: (performance.now() - start).toFixed(2) });
      throw error;
    }
  }
}

/**
 * Logger that discards everything, for embedding the core without output
 */
export const silentLogger: Logger = {
  child: () => silentLogger,
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  timed: (_label, fn) => fn(),
};

/**
 * Create the process root logger. Components receive children of it.
 */
export function createRootLogger(options: LoggerOptions = {}): TitlecastLogger {
  return new TitlecastLogger(options);
}
