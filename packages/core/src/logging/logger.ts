/**
 * @fileoverview Centralized logging for daybook
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output by default
 * - Pretty printing on an interactive terminal
 * - Component-scoped child loggers
 *
 * Everything is written to stderr so a terminal front end owning stdout
 * is never disturbed.
 */

import pino from 'pino';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  date?: string;
  [key: string]: unknown;
}

// =============================================================================
// Logger Factory
// =============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function defaultPretty(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test' && process.stderr.isTTY === true;
}

/**
 * Create a configured pino logger instance
 */
function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  // Default to 'warn' so an interactive session stays quiet
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
  const pretty = options.pretty ?? defaultPretty();

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'daybook',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        name: bindings.name,
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
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

export class DaybookLogger {
  private pino: pino.Logger;
  private context: LogContext;

  /**
   * @param instance - existing pino logger to wrap instead of opening a new destination
   */
  constructor(options: LoggerOptions = {}, context: LogContext = {}, instance?: pino.Logger) {
    this.pino = instance ?? createPinoLogger(options);
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): DaybookLogger {
    return new DaybookLogger({}, { ...this.context, ...context }, this.pino.child(context));
  }

  getContext(): LogContext {
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

  /**
   * Log at error level; an Error is attached under `err`
   */
  error(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }

  fatal(msg: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.fatal({ err: error }, msg);
    } else {
      this.pino.fatal(error ?? {}, msg);
    }
  }

  /**
   * Start a timer for performance tracking
   */
  startTimer(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: duration.toFixed(2) });
    };
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: DaybookLogger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(options?: LoggerOptions): DaybookLogger {
  if (!defaultLogger) {
    defaultLogger = new DaybookLogger(options);
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): DaybookLogger {
  return getLogger().child({ component, ...context });
}

/**
 * Reset the default logger (for testing)
 */
export function resetLogger(): void {
  defaultLogger = null;
}
