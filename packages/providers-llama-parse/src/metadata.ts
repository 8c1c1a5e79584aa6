/**
 * LlamaParse Provider Metadata
 *
 * Static card including:
 * - Supported file types (from LlamaParse documentation)
 * - Setup fields and the env var that can supply them
 * - Methods
 */

import type { ProviderCard } from '@docket/core';
import { DEFAULT_LIMITS } from '@docket/core/security';
import { LLAMA_PARSE_SETUP_SCHEMA } from './schemas.js';
import { LLAMA_PARSE_PROVIDER } from './types.js';

/**
 * Supported MIME types by category
 */
export const SUPPORTED_MIME_TYPES = {
  DOCUMENT: [
    'application/pdf',
    'application/msword',
    'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    'application/rtf',
    'application/epub+zip',
    'text/plain',
    'text/html',
  ] as const,

  SPREADSHEET: [
    'text/csv',
    'application/vnd.ms-excel',
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  ] as const,

  PRESENTATION: [
    'application/vnd.ms-powerpoint',
    'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  ] as const,

  IMAGE: [
    'image/png',
    'image/jpeg',
    'image/gif',
    'image/webp',
    'image/tiff',
  ] as const,
} as const;

const ALL_SUPPORTED_MIME_TYPES = [
  ...SUPPORTED_MIME_TYPES.DOCUMENT,
  ...SUPPORTED_MIME_TYPES.SPREADSHEET,
  ...SUPPORTED_MIME_TYPES.PRESENTATION,
  ...SUPPORTED_MIME_TYPES.IMAGE,
] as const;

export type SupportedMimeType = typeof ALL_SUPPORTED_MIME_TYPES[number];

export const LLAMA_PARSE_METHODS = [
  {
    method: 'parse',
    description: 'Parse and Extract the Files',
  },
] as const;

export type LlamaParseMethod = typeof LLAMA_PARSE_METHODS[number]['method'];

export const LLAMA_PARSE_CARD: ProviderCard<typeof LLAMA_PARSE_PROVIDER> = {
  provider: LLAMA_PARSE_PROVIDER,
  setup: {
    fields: ['llamaparse_api_key'],
    schema: LLAMA_PARSE_SETUP_SCHEMA,
  },
  methods: LLAMA_PARSE_METHODS,
  info: {
    url: 'https://www.llamaindex.ai/',
    docs: 'https://docs.cloud.llamaindex.ai/llamaparse/getting_started',
    icon: 'https://www.llamaindex.ai/favicon.ico',
    friendlyName: 'LlamaParse',
  },
  apiConfig: {
    requiresApiKey: true,
    envVar: 'LLAMAPARSE_API_KEY',
    defaultEndpoint: 'https://api.cloud.llamaindex.ai',
  },
  inputFormats: {
    mimeTypes: ALL_SUPPORTED_MIME_TYPES,
    inputMethods: ['base64'],
    maxFileSize: DEFAULT_LIMITS.MAX_FILE_SIZE / 1024 / 1024,
  },
};

/**
 * Check if a MIME type is supported
 */
export function isMimeTypeSupported(mimeType: string): mimeType is SupportedMimeType {
  return ALL_SUPPORTED_MIME_TYPES.some((supported) => supported === mimeType);
}
