/**
 * Integration Error Classes
 *
 * All errors are local and synchronous: configuration and validation errors
 * are raised before any request is dispatched, normalization errors after a
 * provider answered with a payload that cannot be interpreted.
 */

/**
 * Error codes raised by the contract layer
 */
export const ErrorCodes = {
  // Configuration
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  INVALID_CREDENTIAL: 'INVALID_CREDENTIAL',
  UNKNOWN_SETUP_FIELD: 'UNKNOWN_SETUP_FIELD',

  // Validation
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  INVALID_ENUM: 'INVALID_ENUM',
  MISSING_FIELD: 'MISSING_FIELD',
  INVALID_TYPE: 'INVALID_TYPE',
  INVALID_FORMAT: 'INVALID_FORMAT',
  UNKNOWN_FIELD: 'UNKNOWN_FIELD',
  UNKNOWN_PROVIDER: 'UNKNOWN_PROVIDER',
  UNKNOWN_METHOD: 'UNKNOWN_METHOD',

  // Normalization
  MALFORMED_RESPONSE: 'MALFORMED_RESPONSE',
  MISSING_CONTENT: 'MISSING_CONTENT',
  INVALID_METADATA: 'INVALID_METADATA',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ConfigErrorCode =
  | typeof ErrorCodes.MISSING_CREDENTIAL
  | typeof ErrorCodes.INVALID_CREDENTIAL
  | typeof ErrorCodes.UNKNOWN_SETUP_FIELD;

export type ValidationErrorCode =
  | typeof ErrorCodes.OUT_OF_RANGE
  | typeof ErrorCodes.INVALID_ENUM
  | typeof ErrorCodes.MISSING_FIELD
  | typeof ErrorCodes.INVALID_TYPE
  | typeof ErrorCodes.INVALID_FORMAT
  | typeof ErrorCodes.UNKNOWN_FIELD
  | typeof ErrorCodes.UNKNOWN_PROVIDER
  | typeof ErrorCodes.UNKNOWN_METHOD;

export type NormalizationErrorCode =
  | typeof ErrorCodes.MALFORMED_RESPONSE
  | typeof ErrorCodes.MISSING_CONTENT
  | typeof ErrorCodes.INVALID_METADATA;

/**
 * A single field-level problem found while validating a value
 */
export interface ValidationIssue {
  code: ValidationErrorCode;
  /** Dotted path of the offending field, e.g. `num_workers` or `params.depth` */
  field: string;
  message: string;
}

/**
 * Base error class for all integration contract errors
 */
export class IntegrationError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IntegrationError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace in V8 (Node.js)
    const ErrorConstructor = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: Function) => void;
    };
    if (ErrorConstructor.captureStackTrace) {
      ErrorConstructor.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Missing or invalid provider credentials
 */
export class ConfigError extends IntegrationError {
  declare readonly code: ConfigErrorCode;
  /** Setup field the error refers to */
  readonly field: string;

  constructor(
    code: ConfigErrorCode,
    field: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, { field, ...details });
    this.name = 'ConfigError';
    this.field = field;
  }
}

/**
 * Arguments (or the integration envelope) violate the declared contract
 */
export class ValidationError extends IntegrationError {
  declare readonly code: ValidationErrorCode;
  /** First offending field */
  readonly field: string;
  /** Every problem found, first one first */
  readonly issues: ValidationIssue[];

  constructor(issues: [ValidationIssue, ...ValidationIssue[]]) {
    const [first] = issues;
    super(first.code, first.message, { field: first.field, issues });
    this.name = 'ValidationError';
    this.field = first.field;
    this.issues = issues;
  }

  /**
   * Shorthand for an error with a single issue
   */
  static of(code: ValidationErrorCode, field: string, message: string): ValidationError {
    return new ValidationError([{ code, field, message }]);
  }
}

/**
 * A provider answered, but its payload does not have the expected shape
 */
export class NormalizationError extends IntegrationError {
  declare readonly code: NormalizationErrorCode;
  /** The payload as received, kept for diagnosis */
  readonly rawResponse: unknown;
  /** Index of the offending item when the error concerns a single item */
  readonly index?: number;

  constructor(
    code: NormalizationErrorCode,
    message: string,
    rawResponse: unknown,
    index?: number
  ) {
    super(code, message, index === undefined ? undefined : { index });
    this.name = 'NormalizationError';
    this.rawResponse = rawResponse;
    this.index = index;
  }
}

/**
 * Extract a human-readable message from any thrown value
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
