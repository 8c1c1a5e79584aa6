/**
 * Resource Limits
 *
 * Size and depth limits applied to inline payloads (base64 uploads) and to
 * raw provider responses handed over as JSON text.
 */

/**
 * Default resource limits
 *
 * - MAX_FILE_SIZE (100MB): largest decoded upload accepted in arguments
 * - MAX_JSON_DEPTH (100): deepest nesting accepted when parsing raw responses
 */
export const DEFAULT_LIMITS = {
  MAX_FILE_SIZE: 100 * 1024 * 1024,
  MAX_JSON_DEPTH: 100,
} as const;

/**
 * Validate file size before processing
 *
 * @param size - The file size in bytes
 * @param maxSize - Maximum allowed size in bytes (default 100MB)
 * @throws Error if file exceeds size limit
 */
export function validateFileSize(
  size: number,
  maxSize: number = DEFAULT_LIMITS.MAX_FILE_SIZE
): void {
  if (size > maxSize) {
    const maxMB = Math.round(maxSize / 1024 / 1024);
    const sizeMB = Math.round(size / 1024 / 1024);
    throw new Error(
      `File size ${sizeMB}MB exceeds maximum allowed size of ${maxMB}MB`
    );
  }
}

/**
 * JSON parse with a nesting depth limit
 *
 * @param text - JSON string to parse
 * @param maxDepth - Maximum nesting depth in levels (default 100)
 * @throws Error if JSON exceeds depth limit or is invalid
 *
 * @example
 * ```typescript
 * const body = safeJsonParse(responseText);
 * ```
 */
export function safeJsonParse(
  text: string,
  maxDepth: number = DEFAULT_LIMITS.MAX_JSON_DEPTH
): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  validateJsonDepth(parsed, maxDepth);
  return parsed;
}

/**
 * Check the nesting depth of an already-decoded value. The walk stops at
 * `maxDepth`, so cyclic values are reported as too deep.
 *
 * @throws Error if the value nests deeper than `maxDepth` levels
 */
export function validateJsonDepth(
  value: unknown,
  maxDepth: number = DEFAULT_LIMITS.MAX_JSON_DEPTH
): void {
  function checkDepth(node: unknown, depth: number): void {
    if (depth > maxDepth) {
      throw new Error(`JSON nesting depth exceeds maximum of ${maxDepth}`);
    }

    if (typeof node === 'object' && node !== null) {
      for (const child of Object.values(node)) {
        checkDepth(child, depth + 1);
      }
    }
  }

  checkDepth(value, 0);
}
