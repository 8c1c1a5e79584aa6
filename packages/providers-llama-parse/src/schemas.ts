/**
 * JSON Schemas for LlamaParse setup and arguments
 */

import type { ObjectSchema } from '@docket/core';
import { LLAMA_PARSE_RESULT_FORMATS, NUM_WORKERS_RANGE } from './types.js';

export const LLAMA_PARSE_SETUP_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    llamaparse_api_key: {
      type: 'string',
      minLength: 1,
      pattern: '\\S',
      description: 'API key for LlamaParse',
    },
  },
  required: ['llamaparse_api_key'],
  additionalProperties: false,
};

export const LLAMA_PARSE_ARGUMENTS_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    file: {
      type: 'string',
      minLength: 1,
      description: 'The base64-encoded file to parse',
    },
    filename: {
      type: 'string',
      minLength: 1,
      description: 'File name; random when absent',
    },
    result_format: {
      type: 'string',
      enum: [...LLAMA_PARSE_RESULT_FORMATS],
      default: 'text',
      description: 'The format of the result',
    },
    num_workers: {
      type: 'integer',
      minimum: NUM_WORKERS_RANGE.min,
      maximum: NUM_WORKERS_RANGE.max,
      default: 2,
      description: 'Number of workers processing the document in parallel',
    },
    verbose: {
      type: 'boolean',
      default: true,
      description: 'Verbose mode',
    },
    language: {
      type: 'string',
      default: 'en',
      description: 'Language of the document',
    },
  },
  required: ['file'],
  additionalProperties: false,
};
