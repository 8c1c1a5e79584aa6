/**
 * Crypto Adapter
 *
 * Crypto-secure random values via the Web Crypto API (globalThis.crypto,
 * available in Node.js 20).
 *
 * @module @docket/core/runtime/crypto
 */

/**
 * Generate crypto-secure random bytes
 *
 * @param length - Number of random bytes to generate
 */
export function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length);

  if (typeof globalThis !== 'undefined' && globalThis.crypto?.getRandomValues) {
    globalThis.crypto.getRandomValues(bytes);
    return bytes;
  }

  throw new Error('Web Crypto API not available. Node.js 20 or later is required.');
}

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Generate a UUID v4 string
 *
 * Format: xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
 *
 * @example
 * ```typescript
 * const name = `${randomUUID()}.pdf`;
 * ```
 */
export function randomUUID(): string {
  if (typeof globalThis !== 'undefined' && globalThis.crypto?.randomUUID) {
    return globalThis.crypto.randomUUID();
  }

  const bytes = getRandomBytes(16);

  // Version 4, variant 10
  bytes[6] = (bytes[6] & 0x0f) | 0x40;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytesToHex(bytes);
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}
