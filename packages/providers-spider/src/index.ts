/**
 * @docket/providers-spider
 *
 * Contract for the Spider web-crawling API (https://spider.cloud/)
 *
 * @example
 * ```typescript
 * import { spiderContract } from '@docket/providers-spider';
 *
 * const setup = spiderContract.validateSetup({ spider_api_key: process.env.SPIDER_API_KEY });
 * const args = spiderContract.validateArguments({ url: 'https://example.com' });
 * // ...call Spider...
 * const { documents } = spiderContract.normalize(rawResult);
 * ```
 */

export { createSpiderContract, spiderContract } from './spider.js';
export type { SpiderContract, SpiderContractOptions } from './spider.js';

export { SPIDER_CARD, SPIDER_METHODS } from './metadata.js';
export type { SpiderMethod } from './metadata.js';

export { SPIDER_SETUP_SCHEMA, SPIDER_ARGUMENTS_SCHEMA } from './schemas.js';

export { SPIDER_PROVIDER, SPIDER_MODES } from './types.js';
export type {
  SpiderMode,
  SpiderSetup,
  SpiderFetchArguments,
  ResolvedSpiderFetchArguments,
} from './types.js';
