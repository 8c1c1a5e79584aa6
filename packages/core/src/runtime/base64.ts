/**
 * Base64 Helpers
 *
 * Inspection helpers for base64 payloads carried inside fetch arguments.
 * Payloads are never fully decoded here; only sizes and leading bytes are read.
 *
 * @module @docket/core/runtime/base64
 */

const DATA_URI_PREFIX = /^data:[^;,]+;base64,/;

// Standard alphabet, optional padding
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

// MIME-style encoders wrap output at 64 or 76 columns
const LINE_BREAKS = /\r?\n/g;

/**
 * Check if a string is a data URI with base64 payload
 */
export function isDataUri(input: string): boolean {
  return DATA_URI_PREFIX.test(input);
}

/**
 * Remove a `data:<mime>;base64,` prefix if present
 */
export function stripDataUri(input: string): string {
  return input.replace(DATA_URI_PREFIX, '');
}

/**
 * Extract MIME type from data URI
 *
 * @returns MIME type or null if the input is not a data URI
 *
 * @example
 * ```typescript
 * extractMimeType("data:application/pdf;base64,JVBERi0x"); // "application/pdf"
 * ```
 */
export function extractMimeType(dataUri: string): string | null {
  const match = dataUri.match(/^data:([^;,]+);base64,/);
  return match ? match[1] : null;
}

/**
 * Payload without data URI prefix or line breaks
 */
function payloadOf(input: string): string {
  return stripDataUri(input).replace(LINE_BREAKS, '');
}

/**
 * Check that a string is well-formed standard base64 (data URI prefix and
 * line breaks allowed). The empty payload is not considered valid.
 */
export function isBase64(input: string): boolean {
  const body = payloadOf(input);
  if (body.length === 0 || body.length % 4 !== 0) {
    return false;
  }
  return BASE64_BODY.test(body);
}

/**
 * Number of bytes the payload decodes to, without decoding it
 */
export function decodedByteLength(input: string): number {
  const body = payloadOf(input);
  const padding = body.endsWith('==') ? 2 : body.endsWith('=') ? 1 : 0;
  return Math.floor((body.length * 3) / 4) - padding;
}

/**
 * Decode only the first `byteCount` bytes of a base64 payload
 */
export function decodeLeadingBytes(input: string, byteCount: number): Uint8Array {
  const body = payloadOf(input);
  // 4 base64 chars per 3 bytes, rounded up to a full quantum
  const chars = Math.ceil(byteCount / 3) * 4;
  const decoded = Buffer.from(body.substring(0, chars), 'base64');
  return new Uint8Array(decoded.buffer, decoded.byteOffset, Math.min(decoded.byteLength, byteCount));
}
