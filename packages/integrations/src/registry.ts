/**
 * Integration registry
 *
 * Knows every supported provider and is the single entry point the
 * invocation layer goes through: discover providers, validate an
 * integration definition before dispatch, and normalize what came back.
 */

import {
  ErrorCodes,
  isPlainObject,
  NormalizationError,
  ValidationError,
  type FetchOutput,
  type ProviderCard,
} from '@docket/core';
import { createLogger, type Logger } from '@docket/core/observability';
import { previewPayload, sanitizeError } from '@docket/core/security';
import { LLAMA_PARSE_PROVIDER, llamaParseContract } from '@docket/providers-llama-parse';
import { SPIDER_PROVIDER, spiderContract } from '@docket/providers-spider';
import { setupFromEnv } from './config.js';
import type {
  ContractMap,
  ProviderName,
  ProviderTypes,
  ResolvedIntegration,
  ResolvedIntegrationOf,
} from './types.js';

export const PROVIDER_NAMES: readonly ProviderName[] = [SPIDER_PROVIDER, LLAMA_PARSE_PROVIDER];

const ENVELOPE_FIELDS = ['provider', 'method', 'setup', 'arguments'];

/**
 * Check whether a value is a known provider tag
 */
export function isProviderName(value: unknown): value is ProviderName {
  return typeof value === 'string' && PROVIDER_NAMES.some((name) => name === value);
}

export interface IntegrationRegistryOptions {
  /** Replace the default contract of one or more providers */
  contracts?: Partial<ContractMap>;
  logger?: Logger;
  /** Fall back to the provider's env var when a definition has no setup (default: true) */
  useEnv?: boolean;
}

export class IntegrationRegistry {
  private contracts: ContractMap;
  private logger: Logger;
  private useEnv: boolean;

  constructor(options: IntegrationRegistryOptions = {}) {
    this.contracts = {
      spider: options.contracts?.spider ?? spiderContract,
      llama_parse: options.contracts?.llama_parse ?? llamaParseContract,
    };
    this.logger = options.logger ?? createLogger({ metadata: { component: 'integrations' } });
    this.useEnv = options.useEnv ?? true;
  }

  /**
   * Get all provider tags
   */
  listProviders(): ProviderName[] {
    return [...PROVIDER_NAMES];
  }

  getContract<P extends ProviderName>(provider: P): ContractMap[P] {
    return this.contracts[provider];
  }

  describeProvider<P extends ProviderName>(provider: P): Readonly<ProviderCard<P>> {
    return this.contracts[provider].describe();
  }

  listProviderCards(): Readonly<ProviderCard<ProviderName>>[] {
    return PROVIDER_NAMES.map((provider) => this.contracts[provider].describe());
  }

  /**
   * Providers offering a method with this name
   */
  findProvidersByMethod(method: string): ProviderName[] {
    return PROVIDER_NAMES.filter((provider) =>
      this.contracts[provider].describe().methods.some((entry) => entry.method === method)
    );
  }

  /**
   * Validated setup for a provider. When `setup` is omitted the provider's
   * env var is used (unless disabled).
   *
   * @throws ConfigError when no usable credential is found
   */
  resolveSetup<P extends ProviderName>(provider: P, setup?: unknown): ProviderTypes[P]['setup'] {
    const contract = this.contracts[provider];
    const candidate = setup === undefined && this.useEnv
      ? setupFromEnv(contract.describe())
      : setup;
    return contract.validateSetup(candidate);
  }

  /**
   * Validate an integration definition before anything is dispatched.
   *
   * @throws ValidationError for unknown providers, methods or fields and bad arguments
   * @throws ConfigError when credentials are missing
   */
  validateIntegration(definition: unknown): ResolvedIntegration {
    try {
      const resolved = this.resolveDefinition(definition);
      this.logger.debug('Validated integration', {
        provider: resolved.provider,
        method: resolved.method,
      });
      return resolved;
    } catch (error) {
      this.logger.debug('Rejected integration definition', { error: sanitizeError(error instanceof Error ? error : String(error)) });
      throw error;
    }
  }

  /**
   * Map a provider's raw result into documents. Failures are logged with a
   * bounded preview of the raw payload and rethrown.
   *
   * @throws NormalizationError
   */
  normalizeOutput(provider: ProviderName, raw: unknown): FetchOutput {
    const contract = this.contracts[provider];
    try {
      const output = contract.normalize(raw);
      this.logger.debug('Normalized provider response', {
        provider,
        documents: output.documents.length,
      });
      return output;
    } catch (error) {
      if (error instanceof NormalizationError) {
        this.logger.warn('Could not normalize provider response', {
          provider,
          code: error.code,
          index: error.index,
          reason: sanitizeError(error),
          rawResponse: previewPayload(error.rawResponse),
        });
      }
      throw error;
    }
  }

  private resolveDefinition(definition: unknown): ResolvedIntegration {
    if (!isPlainObject(definition)) {
      throw ValidationError.of(
        ErrorCodes.INVALID_TYPE,
        'integration',
        'integration definition must be an object'
      );
    }

    const unexpected = Object.keys(definition).find((key) => !ENVELOPE_FIELDS.includes(key));
    if (unexpected !== undefined) {
      throw ValidationError.of(
        ErrorCodes.UNKNOWN_FIELD,
        unexpected,
        `${unexpected} is not a recognised field`
      );
    }

    const { provider } = definition;
    if (provider === undefined) {
      throw ValidationError.of(ErrorCodes.MISSING_FIELD, 'provider', 'provider is required');
    }
    if (!isProviderName(provider)) {
      throw ValidationError.of(
        ErrorCodes.UNKNOWN_PROVIDER,
        'provider',
        `Unknown provider ${JSON.stringify(provider)}. Known providers: ${PROVIDER_NAMES.join(', ')}`
      );
    }

    switch (provider) {
      case 'spider':
        return this.resolveFor('spider', definition);
      case 'llama_parse':
        return this.resolveFor('llama_parse', definition);
    }
  }

  private resolveFor<P extends ProviderName>(
    provider: P,
    definition: Record<string, unknown>
  ): ResolvedIntegrationOf<P> {
    const contract = this.contracts[provider];
    const method = this.resolveMethod(contract.describe(), definition.method);
    const setup = this.resolveSetup(provider, definition.setup);
    const args = contract.validateArguments(definition.arguments);
    return { provider, method, setup, arguments: args };
  }

  private resolveMethod(card: Readonly<ProviderCard>, method: unknown): string {
    const known = card.methods.map((entry) => entry.method);

    if (method === undefined) {
      return known[0];
    }
    if (typeof method !== 'string') {
      throw ValidationError.of(ErrorCodes.INVALID_TYPE, 'method', 'method must be a string');
    }
    if (!known.includes(method)) {
      throw ValidationError.of(
        ErrorCodes.UNKNOWN_METHOD,
        'method',
        `${card.provider} has no method "${method}". Available: ${known.join(', ')}`
      );
    }
    return method;
  }
}

/**
 * Default registry with the built-in contracts
 */
export const integrationRegistry = new IntegrationRegistry();
