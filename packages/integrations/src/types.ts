/**
 * Integration definitions
 *
 * An integration definition is a tagged union keyed by `provider`. Every
 * variant shares the same envelope: an optional method name, an optional
 * setup and optional arguments.
 */

import type { ProviderContract } from '@docket/core';
import type {
  LlamaParseFetchArguments,
  LlamaParseMethod,
  LlamaParseSetup,
  ResolvedLlamaParseFetchArguments,
} from '@docket/providers-llama-parse';
import type {
  ResolvedSpiderFetchArguments,
  SpiderFetchArguments,
  SpiderMethod,
  SpiderSetup,
} from '@docket/providers-spider';

/**
 * Per-provider shapes, keyed by provider tag
 */
export interface ProviderTypes {
  spider: {
    method: SpiderMethod;
    setup: SpiderSetup;
    arguments: SpiderFetchArguments;
    resolvedArguments: ResolvedSpiderFetchArguments;
  };
  llama_parse: {
    method: LlamaParseMethod;
    setup: LlamaParseSetup;
    arguments: LlamaParseFetchArguments;
    resolvedArguments: ResolvedLlamaParseFetchArguments;
  };
}

export type ProviderName = keyof ProviderTypes;

export type ContractMap = {
  [P in keyof ProviderTypes]: ProviderContract<P, ProviderTypes[P]['setup'], ProviderTypes[P]['resolvedArguments']>;
};

/**
 * Integration definition for one provider
 */
export type IntegrationDefOf<P extends ProviderName> = {
  provider: P;
  method?: ProviderTypes[P]['method'];
  setup?: ProviderTypes[P]['setup'];
  arguments?: ProviderTypes[P]['arguments'];
};

export type SpiderIntegrationDef = IntegrationDefOf<'spider'>;

export type LlamaParseIntegrationDef = IntegrationDefOf<'llama_parse'>;

export type IntegrationDef = SpiderIntegrationDef | LlamaParseIntegrationDef;

/**
 * A definition that passed validation: method resolved, setup present,
 * arguments defaulted.
 */
export type ResolvedIntegrationOf<P extends ProviderName> = {
  provider: P;
  method: string;
  setup: ProviderTypes[P]['setup'];
  arguments: ProviderTypes[P]['resolvedArguments'];
};

export type ResolvedIntegration = ResolvedIntegrationOf<'spider'> | ResolvedIntegrationOf<'llama_parse'>;
