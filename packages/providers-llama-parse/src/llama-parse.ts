/**
 * LlamaParse contract
 *
 * Validates credentials and parse arguments for the LlamaParse API and maps
 * parsed documents (`text` + fields) into documents.
 *
 * The uploaded file travels inline as base64, so arguments are checked for a
 * well-formed payload and a bounded decoded size before anything is sent.
 */

import {
  defineProviderContract,
  detectMimeTypeFromBase64,
  ErrorCodes,
  extensionForMimeType,
  extractErrorMessage,
  ValidationError,
  type ProviderContract,
} from '@docket/core';
import { decodedByteLength, isBase64 } from '@docket/core/runtime/base64';
import { randomUUID } from '@docket/core/runtime/crypto';
import { DEFAULT_LIMITS, validateFileSize } from '@docket/core/security';
import { LLAMA_PARSE_CARD } from './metadata.js';
import { LLAMA_PARSE_ARGUMENTS_SCHEMA, LLAMA_PARSE_SETUP_SCHEMA } from './schemas.js';
import {
  LLAMA_PARSE_PROVIDER,
  type LlamaParseSetup,
  type ResolvedLlamaParseFetchArguments,
} from './types.js';

export interface LlamaParseContractOptions {
  /** Largest decoded file accepted, in bytes (default: 100MB) */
  maxFileSize?: number;
}

export type LlamaParseContract = ProviderContract<typeof LLAMA_PARSE_PROVIDER, LlamaParseSetup, ResolvedLlamaParseFetchArguments>;

/**
 * Create the LlamaParse contract
 *
 * @example
 * ```typescript
 * const llamaParse = createLlamaParseContract({ maxFileSize: 20 * 1024 * 1024 });
 * const args = llamaParse.validateArguments({ file: pdfBase64, num_workers: 3 });
 * // { file, num_workers: 3, result_format: 'text', verbose: true, language: 'en' }
 * ```
 */
export function createLlamaParseContract(options: LlamaParseContractOptions = {}): LlamaParseContract {
  const maxFileSize = options.maxFileSize ?? DEFAULT_LIMITS.MAX_FILE_SIZE;

  return defineProviderContract<typeof LLAMA_PARSE_PROVIDER, LlamaParseSetup, ResolvedLlamaParseFetchArguments>({
    provider: LLAMA_PARSE_PROVIDER,
    card: LLAMA_PARSE_CARD,
    setupSchema: LLAMA_PARSE_SETUP_SCHEMA,
    argumentsSchema: LLAMA_PARSE_ARGUMENTS_SCHEMA,
    contentField: 'text',
    refineArguments(args) {
      if (!isBase64(args.file)) {
        throw ValidationError.of(
          ErrorCodes.INVALID_FORMAT,
          'file',
          'file must be a base64-encoded string'
        );
      }

      try {
        validateFileSize(decodedByteLength(args.file), maxFileSize);
      } catch (error) {
        throw ValidationError.of(ErrorCodes.OUT_OF_RANGE, 'file', `file is too large: ${extractErrorMessage(error)}`);
      }
    },
  });
}

export const llamaParseContract = createLlamaParseContract();

/**
 * Name under which the file is uploaded: the given `filename`, otherwise a
 * random UUID with an extension guessed from the file's leading bytes.
 *
 * @example
 * ```typescript
 * resolveUploadFilename({ file: 'JVBERi0xLjcK', filename: 'report.pdf' }); // 'report.pdf'
 * resolveUploadFilename({ file: 'JVBERi0xLjcK' }); // e.g. '0f8e...-...-....pdf'
 * ```
 */
export function resolveUploadFilename(args: { file: string; filename?: string }): string {
  if (args.filename) {
    return args.filename;
  }

  const mimeType = detectMimeTypeFromBase64(args.file);
  const extension = mimeType ? extensionForMimeType(mimeType) : undefined;
  const name = randomUUID();
  return extension ? `${name}.${extension}` : name;
}
