/**
 * Structured logging for Tessera.
 *
 * Entries are handed to a sink: a custom handler, JSON lines on the
 * console, or nothing at all. Packages log unconditionally; output appears
 * only once the application configures a sink.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Receives every entry at or above the logger's level */
export type LogSink = (entry: LogEntry) => void;

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Module name prefix */
  readonly module?: string;
  /** Custom sink; takes precedence over `json` */
  readonly handler?: LogSink;
  /** Write entries to the console as JSON lines */
  readonly json?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function writeLine(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

/** One JSON object per line; warnings and errors go to stderr */
export const jsonSink: LogSink = (entry) => {
  writeLine(entry.level, JSON.stringify(entry));
};

/** Single human-readable line per entry */
export const prettySink: LogSink = (entry) => {
  const time = new Date(entry.timestamp).toISOString();
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  writeLine(entry.level, `${time} ${entry.level.toUpperCase().padEnd(5)} [${entry.module}] ${entry.message}${context}`);
};

/**
 * @example
 * ```typescript
 * import { createLogger } from '@tessera/core';
 *
 * const log = createLogger({ module: 'coordinator', json: true });
 * log.info('Connection joined room', { connectionId, roomId });
 *
 * const locks = log.child('locks');
 * locks.error('Lock sweep failed', error, { holderId });
 * ```
 */
export class Logger {
  readonly module: string;
  readonly level: LogLevel;
  private readonly sink: LogSink | null;

  constructor(config: LoggerConfig = {}) {
    this.module = config.module ?? 'tessera';
    this.level = config.level ?? 'info';
    this.sink = config.handler ?? (config.json ? jsonSink : null);
  }

  /** Logger for a sub-module, sharing this logger's level and sink */
  child(subModule: string): Logger {
    return new Logger({
      level: this.level,
      module: `${this.module}:${subModule}`,
      ...(this.sink ? { handler: this.sink } : {}),
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /** Log at error level; accepts anything a `catch` clause hands over */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    let details: Record<string, unknown> | undefined;
    if (error instanceof Error) {
      details = { error: { name: error.name, message: error.message, stack: error.stack } };
    } else if (error !== undefined) {
      details = { error: { message: String(error) } };
    }
    this.log('error', message, details || context ? { ...context, ...details } : undefined);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.sink || LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    this.sink({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    });
  }
}

/** Factory function to create a Logger */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}
