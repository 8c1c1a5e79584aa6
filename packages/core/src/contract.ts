/**
 * Provider Contract
 *
 * A contract bundles everything the invocation layer needs to call one
 * provider: credential checks, argument defaults and validation, the static
 * provider card, and response normalization. Every operation is synchronous
 * and side-effect free.
 *
 * @example
 * ```typescript
 * const contract = defineProviderContract<'acme', AcmeSetup, AcmeArguments>({
 *   provider: 'acme',
 *   card: ACME_CARD,
 *   setupSchema: ACME_SETUP_SCHEMA,
 *   argumentsSchema: ACME_ARGUMENTS_SCHEMA,
 *   contentField: 'body',
 * });
 *
 * const args = contract.validateArguments({ query: 'invoices' });
 * const output = contract.normalize(rawResponse);
 * ```
 */

import {
  ConfigError,
  ErrorCodes,
  NormalizationError,
  ValidationError,
  extractErrorMessage,
  type ConfigErrorCode,
  type ValidationIssue,
} from './errors.js';
import {
  applySchemaDefaults,
  compileSchema,
  fieldOf,
  toIssues,
  type ObjectSchema,
} from './internal/schema-validator.js';
import { safeJsonParse, validateJsonDepth } from './security/resource-limits.js';
import {
  deepFreeze,
  isJsonValue,
  isPlainObject,
  type DocumentMetadata,
  type FetchDocument,
  type FetchOutput,
  type JsonValue,
  type ProviderCard,
} from './types.js';

export interface ContractDefinition<P extends string, TResolved> {
  provider: P;
  card: ProviderCard<P>;
  setupSchema: ObjectSchema;
  argumentsSchema: ObjectSchema;
  /** Field of each raw item that holds the document text */
  contentField: string;
  /**
   * Checks that JSON Schema cannot express (URL hosts, base64 payloads).
   * Runs after schema validation; throws ValidationError.
   */
  refineArguments?: (args: TResolved) => void;
}

export interface ProviderContract<P extends string = string, TSetup = unknown, TResolved = unknown> {
  readonly provider: P;
  readonly contentField: string;
  /**
   * @throws ConfigError when a credential is absent, empty or mistyped
   */
  validateSetup(setup: unknown): TSetup;
  /**
   * Default-substitution pass on its own. Does not validate.
   */
  applyDefaults(args: Record<string, unknown>): Record<string, unknown>;
  /**
   * Apply defaults, then validate.
   * @throws ValidationError naming the offending field
   */
  validateArguments(args: unknown): TResolved;
  describe(): Readonly<ProviderCard<P>>;
  /**
   * Map a raw provider result (decoded, or as JSON text) into documents.
   * @throws NormalizationError
   */
  normalize(raw: unknown): FetchOutput;
}

function nonEmpty(issues: ValidationIssue[], fallback: ValidationIssue): [ValidationIssue, ...ValidationIssue[]] {
  const [first, ...rest] = issues;
  return first ? [first, ...rest] : [fallback];
}

function configCodeFor(keyword: string): ConfigErrorCode {
  switch (keyword) {
    case 'required':
    case 'minLength':
    case 'pattern':
      return ErrorCodes.MISSING_CREDENTIAL;
    case 'additionalProperties':
      return ErrorCodes.UNKNOWN_SETUP_FIELD;
    default:
      return ErrorCodes.INVALID_CREDENTIAL;
  }
}

/**
 * Build a provider contract from its schemas and card
 */
export function defineProviderContract<P extends string, TSetup, TResolved>(
  definition: ContractDefinition<P, TResolved>
): ProviderContract<P, TSetup, TResolved> {
  const { provider, setupSchema, argumentsSchema, contentField, refineArguments } = definition;

  const checkSetup = compileSchema<TSetup>(setupSchema);
  const checkArguments = compileSchema<TResolved>(argumentsSchema);
  const card = deepFreeze(definition.card);
  const credentialField = setupSchema.required?.[0] ?? 'setup';

  function validateSetup(setup: unknown): TSetup {
    const candidate = setup ?? {};
    if (!isPlainObject(candidate)) {
      throw new ConfigError(
        ErrorCodes.INVALID_CREDENTIAL,
        'setup',
        `${provider} setup must be an object`
      );
    }

    if (checkSetup(candidate)) {
      return structuredClone(candidate);
    }

    const [error] = checkSetup.errors ?? [];
    const field = (error && fieldOf(error)) || credentialField;
    const code = error ? configCodeFor(error.keyword) : ErrorCodes.INVALID_CREDENTIAL;
    const message = code === ErrorCodes.MISSING_CREDENTIAL
      ? `${provider} setup is missing required credential "${field}"`
      : code === ErrorCodes.UNKNOWN_SETUP_FIELD
        ? `${provider} setup does not accept field "${field}"`
        : `${provider} setup field "${field}" must be a string`;

    throw new ConfigError(code, field, message);
  }

  function applyDefaults(args: Record<string, unknown>): Record<string, unknown> {
    return applySchemaDefaults(argumentsSchema, args);
  }

  function validateArguments(args: unknown): TResolved {
    const candidate = args ?? {};
    if (!isPlainObject(candidate)) {
      throw ValidationError.of(
        ErrorCodes.INVALID_TYPE,
        'arguments',
        `${provider} arguments must be an object`
      );
    }

    // Resolved arguments own their nested values (e.g. Spider params)
    let copy: Record<string, unknown>;
    try {
      copy = structuredClone(candidate);
    } catch (error) {
      throw ValidationError.of(
        ErrorCodes.INVALID_TYPE,
        'arguments',
        `${provider} arguments must be plain data: ${extractErrorMessage(error)}`
      );
    }

    const defaulted = applyDefaults(copy);
    if (!checkArguments(defaulted)) {
      throw new ValidationError(nonEmpty(
        toIssues(checkArguments.errors, 'arguments'),
        { code: ErrorCodes.INVALID_FORMAT, field: 'arguments', message: `${provider} arguments are invalid` }
      ));
    }

    refineArguments?.(defaulted);
    return defaulted;
  }

  function toDocument(item: unknown, index: number, raw: unknown): FetchDocument {
    if (!isPlainObject(item)) {
      throw new NormalizationError(
        ErrorCodes.MALFORMED_RESPONSE,
        `${provider} response item ${index} is not an object`,
        raw,
        index
      );
    }

    const content = item[contentField];
    if (typeof content !== 'string') {
      throw new NormalizationError(
        ErrorCodes.MISSING_CONTENT,
        `${provider} response item ${index} has no "${contentField}" text`,
        raw,
        index
      );
    }

    const entries: [string, JsonValue][] = [];
    for (const [key, value] of Object.entries(item)) {
      if (key === contentField) continue;
      if (!isJsonValue(value)) {
        throw new NormalizationError(
          ErrorCodes.INVALID_METADATA,
          `${provider} response item ${index} field "${key}" is not a JSON value`,
          raw,
          index
        );
      }
      entries.push([key, structuredClone(value)]);
    }

    // fromEntries defines own properties, so a "__proto__" key stays plain data
    const metadata: DocumentMetadata = Object.fromEntries(entries);
    return { content, metadata };
  }

  function normalize(raw: unknown): FetchOutput {
    let payload = raw;
    if (typeof raw === 'string') {
      try {
        payload = safeJsonParse(raw);
      } catch (error) {
        throw new NormalizationError(
          ErrorCodes.MALFORMED_RESPONSE,
          `${provider} response is not valid JSON: ${extractErrorMessage(error)}`,
          raw
        );
      }
    } else {
      try {
        validateJsonDepth(raw);
      } catch (error) {
        throw new NormalizationError(
          ErrorCodes.MALFORMED_RESPONSE,
          `${provider} response cannot be normalized: ${extractErrorMessage(error)}`,
          raw
        );
      }
    }

    let items: unknown[] | undefined;
    if (Array.isArray(payload)) {
      items = payload;
    } else if (isPlainObject(payload) && Array.isArray(payload.documents)) {
      items = payload.documents;
    }

    if (!items) {
      throw new NormalizationError(
        ErrorCodes.MALFORMED_RESPONSE,
        `${provider} response must be a list of documents or an object with a "documents" list`,
        raw
      );
    }

    return {
      documents: items.map((item, index) => toDocument(item, index, raw)),
    };
  }

  return {
    provider,
    contentField,
    validateSetup,
    applyDefaults,
    validateArguments,
    describe: () => card,
    normalize,
  };
}
