/**
 * Logging Utility
 *
 * Console logger with level filtering and an optional `onLog` hook that
 * receives structured records (e.g. to forward them to a log pipeline).
 *
 * @module @docket/core/observability/logger
 */

import { getLogLevel, LOG_LEVELS, type LogLevel } from '../runtime/env.js';

export type { LogLevel };

export interface LogRecord {
  timestamp: number;
  level: LogLevel;
  message: string;
  /** Logger-bound metadata merged with per-call data */
  metadata: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Minimum level to emit (default: LOG_LEVEL env, else 'info') */
  level?: LogLevel;
  /** Metadata attached to every record, e.g. `{ provider: 'spider' }` */
  metadata?: Record<string, unknown>;
  /** Receives every emitted record. Errors thrown by the hook are dropped. */
  onLog?: (record: LogRecord) => void;
  /** Write to console (default: true) */
  console?: boolean;
}

/**
 * Logger class with level filtering and hook delivery
 */
export class Logger {
  private options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
  }

  /**
   * Derive a logger with extra bound metadata
   */
  child(metadata: Record<string, unknown>): Logger {
    return new Logger({
      ...this.options,
      metadata: { ...this.options.metadata, ...metadata },
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('error', message, data, error instanceof Error ? error : undefined);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const minimum = this.options.level ?? getLogLevel();
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const metadata: Record<string, unknown> = {
      ...(this.options.metadata || {}),
      ...(data || {}),
    };
    if (error) {
      metadata.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.options.console !== false) {
      const consoleMethod = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      if (Object.keys(metadata).length > 0) {
        consoleMethod(`[${level.toUpperCase()}] ${message}`, metadata);
      } else {
        consoleMethod(`[${level.toUpperCase()}] ${message}`);
      }
    }

    if (this.options.onLog) {
      try {
        this.options.onLog({ timestamp: Date.now(), level, message, metadata });
      } catch (hookError) {
        if (this.options.console !== false) {
          console.error('[ERROR] onLog hook failed', hookError);
        }
      }
    }
  }
}

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
