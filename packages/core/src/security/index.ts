/**
 * Security Utilities Module
 *
 * - URL validation for crawl targets
 * - Resource limit enforcement (upload size, JSON depth)
 * - Error and payload sanitizing for logs
 *
 * @module @docket/core/security
 *
 * @example
 * ```typescript
 * import { validateUrl, safeJsonParse } from '@docket/core/security';
 *
 * const target = validateUrl(args.url);
 * const body = safeJsonParse(responseText, 100);
 * ```
 */

export {
  validateUrl,
} from './url-validator.js';
export type { UrlValidationOptions } from './url-validator.js';

export {
  DEFAULT_LIMITS,
  validateFileSize,
  safeJsonParse,
  validateJsonDepth,
} from './resource-limits.js';

export {
  sanitizeError,
  previewPayload,
  DEFAULT_PREVIEW_LENGTH,
} from './error-sanitizer.js';
export type { ErrorSanitizerOptions } from './error-sanitizer.js';
