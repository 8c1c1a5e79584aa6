import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  ErrorCodes,
  extractErrorMessage,
  IntegrationError,
  NormalizationError,
  ValidationError,
} from '../src/errors.js';

describe('ConfigError', () => {
  it('carries the offending setup field', () => {
    const error = new ConfigError(
      ErrorCodes.MISSING_CREDENTIAL,
      'spider_api_key',
      'spider setup is missing required credential "spider_api_key"'
    );

    expect(error).toBeInstanceOf(IntegrationError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigError');
    expect(error.code).toBe('MISSING_CREDENTIAL');
    expect(error.field).toBe('spider_api_key');
    expect(error.details).toEqual({ field: 'spider_api_key' });
  });

  it('serializes to JSON', () => {
    const error = new ConfigError(ErrorCodes.INVALID_CREDENTIAL, 'setup', 'bad setup');

    expect(error.toJSON()).toEqual({
      name: 'ConfigError',
      code: 'INVALID_CREDENTIAL',
      message: 'bad setup',
      details: { field: 'setup' },
    });
  });
});

describe('ValidationError', () => {
  it('takes code, field and message from the first issue', () => {
    const error = new ValidationError([
      { code: ErrorCodes.OUT_OF_RANGE, field: 'num_workers', message: 'num_workers must be <= 10' },
      { code: ErrorCodes.UNKNOWN_FIELD, field: 'pages', message: 'pages is not a recognised field' },
    ]);

    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('OUT_OF_RANGE');
    expect(error.field).toBe('num_workers');
    expect(error.message).toBe('num_workers must be <= 10');
    expect(error.issues).toHaveLength(2);
    expect(error.details).toEqual({ field: 'num_workers', issues: error.issues });
  });

  it('builds a single-issue error with of()', () => {
    const error = ValidationError.of(ErrorCodes.UNKNOWN_PROVIDER, 'provider', 'Unknown provider "x"');

    expect(error.issues).toEqual([
      { code: 'UNKNOWN_PROVIDER', field: 'provider', message: 'Unknown provider "x"' },
    ]);
  });
});

describe('NormalizationError', () => {
  it('keeps the raw response and item index', () => {
    const raw = [{ text: 'a' }, { page: 2 }];
    const error = new NormalizationError(ErrorCodes.MISSING_CONTENT, 'item 1 has no text', raw, 1);

    expect(error.rawResponse).toBe(raw);
    expect(error.index).toBe(1);
    expect(error.details).toEqual({ index: 1 });
  });

  it('has no details when not about a single item', () => {
    const error = new NormalizationError(ErrorCodes.MALFORMED_RESPONSE, 'not a list', 42);

    expect(error.index).toBeUndefined();
    expect(error.details).toBeUndefined();
  });
});

describe('extractErrorMessage', () => {
  it('reads messages from any thrown value', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage(42)).toBe('42');
  });
});
