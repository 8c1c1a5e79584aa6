/**
 * Shared contract types: documents, provider cards and JSON values.
 */

import type { SchemaObject } from 'ajv';

// ============================================================================
// JSON values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check that a value is representable as JSON (no functions, symbols,
 * class instances, non-finite numbers or undefined).
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

// ============================================================================
// Documents
// ============================================================================

/**
 * Open-ended per-document metadata. Keys are unique; values pass through
 * unchanged from the provider payload.
 */
export type DocumentMetadata = JsonObject;

/**
 * Normalized unit of fetched content
 */
export interface FetchDocument {
  content: string;
  metadata: DocumentMetadata;
}

/**
 * Normalized fetch result. `documents` is always present; it may be empty.
 */
export interface FetchOutput {
  documents: FetchDocument[];
}

// ============================================================================
// Provider cards
// ============================================================================

export interface ProviderMethod {
  /** Method name as used in an integration definition, e.g. `crawl` */
  method: string;
  description: string;
}

export interface ProviderInfo {
  url: string;
  docs: string;
  icon: string;
  friendlyName: string;
}

/**
 * Static capability record for a provider, used for discovery and display
 */
export interface ProviderCard<P extends string = string> {
  provider: P;
  setup: {
    /** Credential fields the setup must carry */
    fields: readonly string[];
    /** JSON Schema of the setup object */
    schema: SchemaObject;
  };
  methods: readonly ProviderMethod[];
  info: ProviderInfo;
  apiConfig: {
    requiresApiKey: boolean;
    /** Environment variable consulted when no setup is given */
    envVar: string;
    defaultEndpoint: string;
  };
  inputFormats?: {
    mimeTypes: readonly string[];
    inputMethods: readonly ('url' | 'base64')[];
    /** MB */
    maxFileSize?: number;
  };
}

/**
 * Recursively freeze a value and return it with a readonly view
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
