/**
 * Runtime Environment Configuration
 *
 * Environment variable access with an overridable source. Credentials for
 * providers (e.g. SPIDER_API_KEY) and logging settings are read through here.
 *
 * @module @docket/core/runtime/env
 */

/**
 * Runtime environment configuration
 *
 * Can be set explicitly or will fall back to process.env when available.
 */
export interface RuntimeEnv {
  /**
   * Node environment (development, production, test)
   */
  NODE_ENV?: string;

  /**
   * Minimum log level: debug, info, warn or error
   */
  LOG_LEVEL?: string;

  /**
   * Additional environment variables
   */
  [key: string]: string | undefined;
}

let globalRuntimeEnv: RuntimeEnv | null = null;

/**
 * Set global runtime environment configuration
 *
 * Takes priority over process.env. Useful for hosts that pass secrets
 * explicitly, and for tests.
 *
 * @example
 * ```typescript
 * setRuntimeEnv({ SPIDER_API_KEY: secrets.spider });
 * ```
 */
export function setRuntimeEnv(env: RuntimeEnv): void {
  globalRuntimeEnv = env;
}

/**
 * Clear global runtime environment configuration (for testing)
 */
export function clearRuntimeEnv(): void {
  globalRuntimeEnv = null;
}

/**
 * Get environment variable value
 *
 * Priority:
 * 1. Explicitly set runtime env (via setRuntimeEnv)
 * 2. process.env
 * 3. defaultValue
 *
 * @example
 * ```typescript
 * const level = getEnv('LOG_LEVEL', 'info');
 * ```
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  if (globalRuntimeEnv && key in globalRuntimeEnv) {
    return globalRuntimeEnv[key] ?? defaultValue;
  }

  if (typeof process !== 'undefined' && process.env) {
    const value = process.env[key];
    if (value !== undefined) {
      return value;
    }
  }

  return defaultValue;
}

/**
 * Check if running in production mode
 */
export function isProduction(): boolean {
  return getEnv('NODE_ENV') === 'production';
}

/**
 * Check if running in test mode
 */
export function isTest(): boolean {
  return getEnv('NODE_ENV') === 'test';
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Minimum log level from LOG_LEVEL (case-insensitive).
 * Unrecognised values fall back to 'info'.
 */
export function getLogLevel(): LogLevel {
  const raw = getEnv('LOG_LEVEL', 'info')?.toLowerCase() ?? 'info';
  return isLogLevel(raw) ? raw : 'info';
}
