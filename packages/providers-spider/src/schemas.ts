/**
 * JSON Schemas for Spider setup and arguments
 */

import type { ObjectSchema } from '@docket/core';
import { SPIDER_MODES } from './types.js';

export const SPIDER_SETUP_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    spider_api_key: {
      type: 'string',
      minLength: 1,
      pattern: '\\S',
      description: 'API key for Spider',
    },
  },
  required: ['spider_api_key'],
  additionalProperties: false,
};

export const SPIDER_ARGUMENTS_SCHEMA: ObjectSchema = {
  type: 'object',
  properties: {
    url: {
      type: 'string',
      minLength: 1,
      description: 'The URL to fetch data from',
    },
    mode: {
      type: 'string',
      enum: [...SPIDER_MODES],
      default: 'scrape',
      description: 'The type of crawler to use',
    },
    // Passed through untouched; Spider validates its own parameters
    params: {
      type: 'object',
      description: 'Additional parameters for the Spider API',
    },
  },
  required: ['url'],
  additionalProperties: false,
};
