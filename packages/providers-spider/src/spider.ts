/**
 * Spider contract
 *
 * Validates credentials and crawl arguments for the Spider API and maps
 * crawl results (`page_content` + fields) into documents.
 */

import {
  defineProviderContract,
  ErrorCodes,
  extractErrorMessage,
  ValidationError,
  type ProviderContract,
} from '@docket/core';
import { validateUrl } from '@docket/core/security';
import { SPIDER_CARD } from './metadata.js';
import { SPIDER_ARGUMENTS_SCHEMA, SPIDER_SETUP_SCHEMA } from './schemas.js';
import { SPIDER_PROVIDER, type ResolvedSpiderFetchArguments, type SpiderSetup } from './types.js';

export interface SpiderContractOptions {
  /**
   * Accept URLs on loopback, private-network and cloud-metadata hosts
   * (default: false)
   */
  allowInternalUrls?: boolean;
}

export type SpiderContract = ProviderContract<typeof SPIDER_PROVIDER, SpiderSetup, ResolvedSpiderFetchArguments>;

/**
 * Create the Spider contract
 *
 * @example
 * ```typescript
 * const spider = createSpiderContract();
 * const args = spider.validateArguments({ url: 'https://example.com' });
 * // { url: 'https://example.com', mode: 'scrape' }
 * ```
 */
export function createSpiderContract(options: SpiderContractOptions = {}): SpiderContract {
  const blockInternal = !options.allowInternalUrls;

  return defineProviderContract<typeof SPIDER_PROVIDER, SpiderSetup, ResolvedSpiderFetchArguments>({
    provider: SPIDER_PROVIDER,
    card: SPIDER_CARD,
    setupSchema: SPIDER_SETUP_SCHEMA,
    argumentsSchema: SPIDER_ARGUMENTS_SCHEMA,
    contentField: 'page_content',
    refineArguments(args) {
      try {
        validateUrl(args.url, { blockInternal });
      } catch (error) {
        throw ValidationError.of(
          ErrorCodes.INVALID_FORMAT,
          'url',
          `url is not a valid crawl target: ${extractErrorMessage(error)}`
        );
      }
    },
  });
}

export const spiderContract = createSpiderContract();
