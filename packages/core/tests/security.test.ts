import { afterEach, describe, expect, it } from 'vitest';
import { ErrorCodes, NormalizationError } from '../src/errors.js';
import { clearRuntimeEnv, setRuntimeEnv } from '../src/runtime/env.js';
import {
  previewPayload,
  safeJsonParse,
  sanitizeError,
  validateFileSize,
  validateJsonDepth,
  validateUrl,
} from '../src/security/index.js';

describe('validateUrl', () => {
  it('returns the parsed URL', () => {
    expect(validateUrl('https://example.com/docs').hostname).toBe('example.com');
  });

  it('accepts public addresses in any range', () => {
    expect(validateUrl('http://200.1.1.1/').hostname).toBe('200.1.1.1');
    expect(validateUrl('http://172.32.0.1/').hostname).toBe('172.32.0.1');
  });

  it.each([
    ['not a url', 'Invalid URL: not a url'],
    ['ftp://example.com/file', 'Blocked protocol: ftp:. Allowed: http:, https:'],
    ['http://169.254.169.254/latest/meta-data', 'Blocked metadata service: 169.254.169.254'],
    ['http://metadata.google.internal/', 'Blocked metadata service: metadata.google.internal'],
    ['http://10.1.2.3/', 'Blocked internal IP address: 10.1.2.3'],
    ['http://192.168.0.10:8080/', 'Blocked internal IP address: 192.168.0.10'],
    ['http://127.0.0.1/', 'Blocked internal IP address: 127.0.0.1'],
    ['http://[::1]:8080/', 'Blocked IPv6 address: [::1]'],
    ['http://localhost:3000/', 'Blocked localhost access'],
    ['http://localhost./', 'Blocked localhost access'],
    ['http://app.localhost:3000/', 'Blocked localhost access'],
    ['http://0.0.0.0:8080/', 'Blocked internal IP address: 0.0.0.0'],
  ])('rejects %s', (url, message) => {
    expect(() => validateUrl(url)).toThrow(message);
  });

  it('allows internal hosts when asked to', () => {
    expect(validateUrl('http://localhost:3000/', { blockInternal: false }).port).toBe('3000');
  });

  it('honours a custom protocol list', () => {
    expect(validateUrl('ftp://example.com/', { allowedProtocols: ['ftp:'] }).protocol).toBe('ftp:');
  });
});

describe('validateFileSize', () => {
  it('accepts sizes within the limit', () => {
    expect(() => validateFileSize(1024, 2048)).not.toThrow();
  });

  it('rejects sizes over the limit', () => {
    expect(() => validateFileSize(3 * 1024 * 1024, 2 * 1024 * 1024)).toThrow(
      'File size 3MB exceeds maximum allowed size of 2MB'
    );
  });
});

describe('safeJsonParse', () => {
  it('parses JSON', () => {
    expect(safeJsonParse('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it('wraps parse errors', () => {
    expect(() => safeJsonParse('nope')).toThrow(/^Invalid JSON: /);
  });

  it('enforces the depth limit', () => {
    expect(safeJsonParse('[[1]]', 2)).toEqual([[1]]);
    expect(() => safeJsonParse('[[[1]]]', 2)).toThrow('JSON nesting depth exceeds maximum of 2');
  });
});

describe('validateJsonDepth', () => {
  it('accepts values within the limit', () => {
    expect(() => validateJsonDepth({ a: [1] }, 2)).not.toThrow();
  });

  it('rejects values nested too deeply', () => {
    expect(() => validateJsonDepth({ a: [[1]] }, 2)).toThrow('JSON nesting depth exceeds maximum of 2');
  });

  it('stops on cyclic values', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(() => validateJsonDepth(cyclic)).toThrow('JSON nesting depth exceeds maximum of 100');
  });
});

describe('sanitizeError', () => {
  afterEach(() => {
    clearRuntimeEnv();
  });

  it('keeps messages outside production', () => {
    expect(sanitizeError(new Error('boom'), { productionMode: false })).toBe('boom');
    expect(sanitizeError('plain', { productionMode: false })).toBe('plain');
  });

  it('reduces errors to name and code in production', () => {
    const error = new NormalizationError(ErrorCodes.MISSING_CONTENT, 'item 3 has no "text" text', []);

    expect(sanitizeError(error, { productionMode: true })).toBe('NormalizationError (MISSING_CONTENT)');
    expect(sanitizeError(new Error('secret path'), { productionMode: true })).toBe('Error');
    expect(sanitizeError('secret path', { productionMode: true })).toBe('Integration error');
  });

  it('reads production mode from NODE_ENV', () => {
    setRuntimeEnv({ NODE_ENV: 'production' });
    expect(sanitizeError(new Error('secret path'))).toBe('Error');
  });
});

describe('previewPayload', () => {
  it('serializes values', () => {
    expect(previewPayload({ a: 1 })).toBe('{"a":1}');
    expect(previewPayload('text')).toBe('text');
    expect(previewPayload(undefined)).toBe('undefined');
  });

  it('truncates long payloads', () => {
    expect(previewPayload('abcdef', 3)).toBe('abc... (3 more chars)');
  });

  it('survives values JSON cannot serialize', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(previewPayload(circular)).toBe('[object Object]');
  });
});
