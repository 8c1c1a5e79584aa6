/**
 * Setup resolution from the runtime environment
 */

import type { ProviderCard } from '@docket/core';
import { getEnv } from '@docket/core/runtime/env';

/**
 * Build a setup object from the env var named on the provider card.
 *
 * @returns undefined when the variable is not set
 *
 * @example
 * ```typescript
 * // SPIDER_API_KEY=test-secret
 * setupFromEnv(SPIDER_CARD); // { spider_api_key: 'test-secret' }
 * ```
 */
export function setupFromEnv(card: Readonly<ProviderCard>): Record<string, string> | undefined {
  const value = getEnv(card.apiConfig.envVar);
  if (value === undefined) {
    return undefined;
  }
  return Object.fromEntries(card.setup.fields.map((field) => [field, value]));
}
