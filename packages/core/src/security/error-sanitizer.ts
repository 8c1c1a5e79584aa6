/**
 * Error Sanitization Module
 *
 * Shapes errors and raw payloads before they reach logs. Raw provider
 * responses may echo user documents, so production logs only carry error
 * codes and a bounded preview.
 *
 * @module @docket/core/security/error-sanitizer
 */

import { isProduction } from '../runtime/env.js';

export interface ErrorSanitizerOptions {
  /** Whether to sanitize error messages for production (default: NODE_ENV === 'production') */
  productionMode?: boolean;
}

/** Default preview length for raw payloads */
export const DEFAULT_PREVIEW_LENGTH = 500;

function readCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Sanitize an error message for logging
 *
 * @example
 * ```typescript
 * sanitizeError(new NormalizationError('MISSING_CONTENT', 'Item 3 has no "text" field', raw));
 * // development: 'Item 3 has no "text" field'
 * // production:  'NormalizationError (MISSING_CONTENT)'
 * ```
 */
export function sanitizeError(
  error: string | Error,
  options: ErrorSanitizerOptions = {}
): string {
  const { productionMode = isProduction() } = options;

  if (typeof error === 'string') {
    return productionMode ? 'Integration error' : error;
  }

  if (!productionMode) {
    return error.message;
  }

  const code = readCode(error);
  return code ? `${error.name} (${code})` : error.name;
}

/**
 * Bounded string preview of an arbitrary value for log records
 *
 * @param maxLength - Maximum preview length before the truncation marker
 */
export function previewPayload(value: unknown, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }

  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}... (${text.length - maxLength} more chars)`;
}
