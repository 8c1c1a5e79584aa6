/**
 * Observability Module
 *
 * @module @docket/core/observability
 */

export { Logger, createLogger } from './logger.js';
export type { LoggerOptions, LogRecord, LogLevel } from './logger.js';
