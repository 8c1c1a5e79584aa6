import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  decodedByteLength,
  decodeLeadingBytes,
  extractMimeType,
  isBase64,
  isDataUri,
  stripDataUri,
} from '../src/runtime/base64.js';
import { bytesToHex, getRandomBytes, randomUUID } from '../src/runtime/crypto.js';
import {
  clearRuntimeEnv,
  getEnv,
  getLogLevel,
  isProduction,
  isTest,
  setRuntimeEnv,
} from '../src/runtime/env.js';
import {
  detectMimeTypeFromBase64,
  detectMimeTypeFromBytes,
  extensionForMimeType,
} from '../src/mime-detection.js';

// "%PDF-1.7\n"
const PDF_BASE64 = 'JVBERi0xLjcK';
// PNG signature
const PNG_BASE64 = 'iVBORw0KGgo=';

describe('base64', () => {
  it.each([
    [PDF_BASE64, true],
    ['SGVsbG8=', true],
    [`data:application/pdf;base64,${PDF_BASE64}`, true],
    ['not base64!', false],
    ['abc', false],
    ['ab c', false],
    ['SGVs\nbG8=', true],
    ['SGVs\r\nbG8=', true],
    ['', false],
    ['data:application/pdf;base64,', false],
  ])('isBase64(%j) is %s', (input, expected) => {
    expect(isBase64(input)).toBe(expected);
  });

  it('handles data URIs', () => {
    const uri = `data:application/pdf;base64,${PDF_BASE64}`;

    expect(isDataUri(uri)).toBe(true);
    expect(isDataUri(PDF_BASE64)).toBe(false);
    expect(stripDataUri(uri)).toBe(PDF_BASE64);
    expect(extractMimeType(uri)).toBe('application/pdf');
    expect(extractMimeType(PDF_BASE64)).toBeNull();
  });

  it('computes the decoded length without decoding', () => {
    expect(decodedByteLength('SGVsbG8h')).toBe(6);
    expect(decodedByteLength('SGVsbG8=')).toBe(5);
    expect(decodedByteLength('SGVsbA==')).toBe(4);
    expect(decodedByteLength('SGVs\r\nbG8=')).toBe(5);
  });

  it('decodes only the leading bytes', () => {
    expect(Array.from(decodeLeadingBytes(PDF_BASE64, 4))).toEqual([0x25, 0x50, 0x44, 0x46]);
    expect(Array.from(decodeLeadingBytes('JV\nBERi0x', 4))).toEqual([0x25, 0x50, 0x44, 0x46]);
  });
});

describe('mime detection', () => {
  it('detects types from base64 payloads', () => {
    expect(detectMimeTypeFromBase64(PDF_BASE64)).toBe('application/pdf');
    expect(detectMimeTypeFromBase64(PNG_BASE64)).toBe('image/png');
    expect(detectMimeTypeFromBase64('SGVsbG8=')).toBeUndefined();
  });

  it('detects types from bytes', () => {
    expect(detectMimeTypeFromBytes(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
    expect(detectMimeTypeFromBytes(new Uint8Array([0x50, 0x4b, 0x03, 0x04]))).toBe('application/zip');
    expect(detectMimeTypeFromBytes(new Uint8Array([0xff, 0xd8]))).toBeUndefined();
  });

  it('maps types to file extensions', () => {
    expect(extensionForMimeType('image/jpeg')).toBe('jpg');
    expect(extensionForMimeType('text/plain')).toBeUndefined();
  });
});

describe('crypto', () => {
  it('generates v4 UUIDs', () => {
    expect(randomUUID()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('generates random bytes', () => {
    expect(getRandomBytes(8)).toHaveLength(8);
  });

  it('formats bytes as hex', () => {
    expect(bytesToHex(new Uint8Array([0, 15, 255]))).toBe('000fff');
  });
});

describe('env', () => {
  afterEach(() => {
    clearRuntimeEnv();
  });

  it('reads from the runtime env first', () => {
    vi.stubEnv('SPIDER_API_KEY', 'from-process');
    setRuntimeEnv({ SPIDER_API_KEY: 'test-secret' });

    expect(getEnv('SPIDER_API_KEY')).toBe('test-secret');
  });

  it('falls back to process.env', () => {
    vi.stubEnv('DOCKET_TEST_VALUE', 'from-process');
    setRuntimeEnv({ OTHER: 'x' });

    expect(getEnv('DOCKET_TEST_VALUE')).toBe('from-process');
  });

  it('falls back to the default', () => {
    expect(getEnv('DOCKET_TEST_UNSET', 'fallback')).toBe('fallback');
    setRuntimeEnv({ DOCKET_TEST_UNSET: undefined });
    expect(getEnv('DOCKET_TEST_UNSET', 'fallback')).toBe('fallback');
  });

  it('reads the log level case-insensitively', () => {
    setRuntimeEnv({ LOG_LEVEL: 'WARN' });
    expect(getLogLevel()).toBe('warn');
  });

  it('falls back to info for unknown log levels', () => {
    setRuntimeEnv({ LOG_LEVEL: 'verbose' });
    expect(getLogLevel()).toBe('info');

    setRuntimeEnv({ LOG_LEVEL: undefined });
    expect(getLogLevel()).toBe('info');
  });

  it('detects production mode', () => {
    setRuntimeEnv({ NODE_ENV: 'production' });
    expect(isProduction()).toBe(true);

    setRuntimeEnv({ NODE_ENV: 'test' });
    expect(isProduction()).toBe(false);
    expect(isTest()).toBe(true);
  });
});
