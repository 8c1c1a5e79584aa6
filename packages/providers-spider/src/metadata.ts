/**
 * Spider Provider Metadata
 *
 * Static card used for capability discovery and display.
 */

import type { ProviderCard } from '@docket/core';
import { SPIDER_SETUP_SCHEMA } from './schemas.js';
import { SPIDER_PROVIDER } from './types.js';

export const SPIDER_METHODS = [
  {
    method: 'crawl',
    description: 'Crawl a website and extract data',
  },
] as const;

export type SpiderMethod = typeof SPIDER_METHODS[number]['method'];

export const SPIDER_CARD: ProviderCard<typeof SPIDER_PROVIDER> = {
  provider: SPIDER_PROVIDER,
  setup: {
    fields: ['spider_api_key'],
    schema: SPIDER_SETUP_SCHEMA,
  },
  methods: SPIDER_METHODS,
  info: {
    url: 'https://spider.cloud/',
    docs: 'https://spider.cloud/docs/api',
    icon: 'https://spider.cloud/favicon.ico',
    friendlyName: 'Spider',
  },
  apiConfig: {
    requiresApiKey: true,
    envVar: 'SPIDER_API_KEY',
    defaultEndpoint: 'https://api.spider.cloud',
  },
};
