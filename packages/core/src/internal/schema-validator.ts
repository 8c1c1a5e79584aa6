/**
 * JSON Schema validation engine
 *
 * Contract schemas are plain JSON Schema (draft-07) objects compiled once
 * with Ajv. Defaults are NOT applied by Ajv: `applySchemaDefaults` is an
 * explicit pass that runs before validation, so the same defaulted value
 * always validates the same way.
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { ErrorCodes, type ValidationErrorCode, type ValidationIssue } from '../errors.js';
import type { JsonValue } from '../types.js';

/**
 * Schema of a single top-level property
 */
export interface PropertySchema extends SchemaObject {
  description?: string;
  default?: JsonValue;
}

/**
 * Top-level object schema used for setups and arguments
 */
export interface ObjectSchema extends SchemaObject {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required?: string[];
  additionalProperties?: boolean;
}

const ajv = new Ajv({
  allErrors: true,
  strict: true,
});

/**
 * Compile a schema into a type guard for `T`
 */
export function compileSchema<T>(schema: ObjectSchema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Return a copy of `input` with every absent property that declares a
 * `default` filled in. Properties set to `undefined` count as absent.
 * The input object is not modified.
 */
export function applySchemaDefaults(
  schema: ObjectSchema,
  input: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  for (const [key, property] of Object.entries(schema.properties)) {
    if (result[key] === undefined && property.default !== undefined) {
      result[key] = structuredClone(property.default);
    }
  }

  return result;
}

function readParam(error: ErrorObject, name: string): unknown {
  const params: Record<string, unknown> = error.params;
  return params[name];
}

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Dotted field path an Ajv error refers to. Errors about a missing or
 * unexpected property point at that property rather than its parent.
 */
export function fieldOf(error: ErrorObject): string {
  const segments = error.instancePath
    .split('/')
    .filter(Boolean)
    .map(decodePointerSegment);

  const child = error.keyword === 'required'
    ? readParam(error, 'missingProperty')
    : error.keyword === 'additionalProperties'
      ? readParam(error, 'additionalProperty')
      : undefined;

  if (typeof child === 'string') {
    segments.push(child);
  }
  return segments.join('.');
}

/**
 * Map an Ajv keyword to a validation error code
 */
export function issueCodeFor(keyword: string): ValidationErrorCode {
  switch (keyword) {
    case 'minimum':
    case 'maximum':
    case 'exclusiveMinimum':
    case 'exclusiveMaximum':
      return ErrorCodes.OUT_OF_RANGE;
    case 'enum':
    case 'const':
      return ErrorCodes.INVALID_ENUM;
    case 'required':
    case 'minLength':
      return ErrorCodes.MISSING_FIELD;
    case 'type':
      return ErrorCodes.INVALID_TYPE;
    case 'additionalProperties':
      return ErrorCodes.UNKNOWN_FIELD;
    default:
      return ErrorCodes.INVALID_FORMAT;
  }
}

/**
 * Human-readable message for an Ajv error
 */
export function describeError(error: ErrorObject, field: string): string {
  switch (error.keyword) {
    case 'required':
      return `${field} is required`;
    case 'additionalProperties':
      return `${field} is not a recognised field`;
    case 'minLength':
      return `${field} must not be empty`;
    case 'enum': {
      const allowed = readParam(error, 'allowedValues');
      const list = Array.isArray(allowed) ? allowed.map((v) => JSON.stringify(v)).join(', ') : '';
      return `${field} must be one of: ${list}`;
    }
    default:
      return `${field} ${error.message ?? 'is invalid'}`;
  }
}

/**
 * Convert Ajv errors into validation issues
 *
 * @param label - Field name used for errors about the root value
 */
export function toIssues(
  errors: ErrorObject[] | null | undefined,
  label: string
): ValidationIssue[] {
  return (errors ?? []).map((error) => {
    const field = fieldOf(error) || label;
    return {
      code: issueCodeFor(error.keyword),
      field,
      message: describeError(error, field),
    };
  });
}
