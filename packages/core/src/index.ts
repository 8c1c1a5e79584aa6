/**
 * @docket/core
 *
 * Contract machinery shared by every provider package: error taxonomy,
 * document and card types, schema validation, and the contract factory.
 */

export {
  IntegrationError,
  ConfigError,
  ValidationError,
  NormalizationError,
  ErrorCodes,
  extractErrorMessage,
} from './errors.js';

export type {
  ErrorCode,
  ConfigErrorCode,
  ValidationErrorCode,
  NormalizationErrorCode,
  ValidationIssue,
} from './errors.js';

export {
  isJsonValue,
  isPlainObject,
  deepFreeze,
} from './types.js';

export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  DocumentMetadata,
  FetchDocument,
  FetchOutput,
  ProviderMethod,
  ProviderInfo,
  ProviderCard,
} from './types.js';

export { defineProviderContract } from './contract.js';
export type { ContractDefinition, ProviderContract } from './contract.js';

export {
  compileSchema,
  applySchemaDefaults,
} from './internal/schema-validator.js';
export type { ObjectSchema, PropertySchema } from './internal/schema-validator.js';

// Re-export MIME detection utilities
export {
  detectMimeTypeFromBase64,
  detectMimeTypeFromBytes,
  extensionForMimeType,
} from './mime-detection.js';
