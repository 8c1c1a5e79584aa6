/**
 * LlamaParse Provider Types
 *
 * Shapes for the LlamaParse document parsing API integration
 * @see https://docs.cloud.llamaindex.ai/llamaparse/getting_started
 */

export const LLAMA_PARSE_PROVIDER = 'llama_parse';

export const LLAMA_PARSE_RESULT_FORMATS = ['text', 'markdown'] as const;

export type LlamaParseResultFormat = typeof LLAMA_PARSE_RESULT_FORMATS[number];

/** Inclusive bounds for `num_workers` */
export const NUM_WORKERS_RANGE = { min: 1, max: 10 } as const;

/**
 * Credentials for the LlamaParse API
 */
export type LlamaParseSetup = {
  /** API key for LlamaParse */
  llamaparse_api_key: string;
};

/**
 * Arguments as a caller writes them
 */
export type LlamaParseFetchArguments = {
  /** The base64-encoded file to parse */
  file: string;
  /** File name; a random one is generated at upload time when absent */
  filename?: string;
  /** Result format (default: 'text') */
  result_format?: LlamaParseResultFormat;
  /** Number of parallel workers, 1-10 (default: 2) */
  num_workers?: number;
  /** Verbose provider-side logging (default: true) */
  verbose?: boolean;
  /** Document language (default: 'en') */
  language?: string;
};

/**
 * Arguments after defaults have been applied and validated
 */
export type ResolvedLlamaParseFetchArguments = {
  file: string;
  filename?: string;
  result_format: LlamaParseResultFormat;
  num_workers: number;
  verbose: boolean;
  language: string;
};
