/**
 * @docket/integrations
 *
 * Registry of supported data-fetching providers and the contract each one
 * exposes.
 *
 * @example
 * ```typescript
 * import { validateIntegration, normalizeOutput } from '@docket/integrations';
 *
 * const integration = validateIntegration({
 *   provider: 'llama_parse',
 *   setup: { llamaparse_api_key: process.env.LLAMAPARSE_API_KEY },
 *   arguments: { file: pdfBase64, num_workers: 3 },
 * });
 *
 * const raw = await invoke(integration);  // HTTP call lives elsewhere
 * const { documents } = normalizeOutput(integration.provider, raw);
 * ```
 */

import type { FetchOutput, ProviderCard } from '@docket/core';
import { integrationRegistry } from './registry.js';
import type { ProviderName, ProviderTypes, ResolvedIntegration } from './types.js';

export {
  IntegrationRegistry,
  integrationRegistry,
  isProviderName,
  PROVIDER_NAMES,
} from './registry.js';
export type { IntegrationRegistryOptions } from './registry.js';

export { setupFromEnv } from './config.js';

export type {
  ProviderTypes,
  ProviderName,
  ContractMap,
  IntegrationDef,
  IntegrationDefOf,
  SpiderIntegrationDef,
  LlamaParseIntegrationDef,
  ResolvedIntegration,
  ResolvedIntegrationOf,
} from './types.js';

export function listProviders(): ProviderName[] {
  return integrationRegistry.listProviders();
}

export function describeProvider<P extends ProviderName>(provider: P): Readonly<ProviderCard<P>> {
  return integrationRegistry.describeProvider(provider);
}

export function listProviderCards(): Readonly<ProviderCard<ProviderName>>[] {
  return integrationRegistry.listProviderCards();
}

export function findProvidersByMethod(method: string): ProviderName[] {
  return integrationRegistry.findProvidersByMethod(method);
}

export function resolveSetup<P extends ProviderName>(provider: P, setup?: unknown): ProviderTypes[P]['setup'] {
  return integrationRegistry.resolveSetup(provider, setup);
}

export function validateIntegration(definition: unknown): ResolvedIntegration {
  return integrationRegistry.validateIntegration(definition);
}

export function normalizeOutput(provider: ProviderName, raw: unknown): FetchOutput {
  return integrationRegistry.normalizeOutput(provider, raw);
}
