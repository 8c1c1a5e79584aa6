/**
 * @docket/providers-llama-parse
 *
 * Contract for the LlamaParse document parsing API (https://www.llamaindex.ai/)
 *
 * @example
 * ```typescript
 * import { llamaParseContract, resolveUploadFilename } from '@docket/providers-llama-parse';
 *
 * const args = llamaParseContract.validateArguments({ file: pdfBase64 });
 * const filename = resolveUploadFilename(args);
 * // ...upload to LlamaParse...
 * const { documents } = llamaParseContract.normalize(rawResult);
 * ```
 */

export {
  createLlamaParseContract,
  llamaParseContract,
  resolveUploadFilename,
} from './llama-parse.js';
export type { LlamaParseContract, LlamaParseContractOptions } from './llama-parse.js';

export {
  LLAMA_PARSE_CARD,
  LLAMA_PARSE_METHODS,
  SUPPORTED_MIME_TYPES,
  isMimeTypeSupported,
} from './metadata.js';
export type { LlamaParseMethod, SupportedMimeType } from './metadata.js';

export { LLAMA_PARSE_SETUP_SCHEMA, LLAMA_PARSE_ARGUMENTS_SCHEMA } from './schemas.js';

export {
  LLAMA_PARSE_PROVIDER,
  LLAMA_PARSE_RESULT_FORMATS,
  NUM_WORKERS_RANGE,
} from './types.js';
export type {
  LlamaParseResultFormat,
  LlamaParseSetup,
  LlamaParseFetchArguments,
  ResolvedLlamaParseFetchArguments,
} from './types.js';
