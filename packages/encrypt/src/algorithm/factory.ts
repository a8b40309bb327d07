/**
 * Encrypt Algorithm Factory
 *
 * Turns a configured `{ type, props }` pair into an algorithm instance.
 * The rule only depends on the {@link AlgorithmFactory} contract; how
 * providers are discovered is up to the caller.
 *
 * @module @vaultline/encrypt/algorithm/factory
 */

import { EncryptAlgorithmNotFoundError } from '../errors.js'
import type { AlgorithmProps, EncryptAlgorithm } from './types.js'

/**
 * Creates algorithm instances from a type name and properties
 */
export interface AlgorithmFactory {
  create(type: string, props: AlgorithmProps): EncryptAlgorithm
}

/**
 * Builds one algorithm instance from its configured properties
 */
export type AlgorithmProvider = (props: AlgorithmProps) => EncryptAlgorithm

/**
 * Provider-backed algorithm factory
 *
 * Type names match case-insensitively.
 *
 * @example
 * ```typescript
 * const factory = createAlgorithmFactory({
 *   AES: props => new AesAlgorithm(String(props['aes-key-value'])),
 *   MD5: () => new Md5AssistedAlgorithm()
 * })
 *
 * factory.create('aes', { 'aes-key-value': 'test-secret' })
 * ```
 */
export class ProviderAlgorithmFactory implements AlgorithmFactory {
  private readonly providers = new Map<string, AlgorithmProvider>()

  constructor(providers: Readonly<Record<string, AlgorithmProvider>> = {}) {
    for (const [type, provider] of Object.entries(providers)) {
      this.registerProvider(type, provider)
    }
  }

  /**
   * Register (or replace) the provider for a type
   */
  registerProvider(type: string, provider: AlgorithmProvider): void {
    this.providers.set(type.toUpperCase(), provider)
  }

  /**
   * Check whether a provider exists for a type
   */
  hasProvider(type: string): boolean {
    return this.providers.has(type.toUpperCase())
  }

  /**
   * Registered type names, upper-cased
   */
  getTypes(): string[] {
    return Array.from(this.providers.keys())
  }

  create(type: string, props: AlgorithmProps): EncryptAlgorithm {
    const provider = this.providers.get(type.toUpperCase())
    if (!provider) {
      throw new EncryptAlgorithmNotFoundError(type, this.getTypes())
    }
    return provider(props)
  }
}

/**
 * Create a provider-backed algorithm factory
 */
export function createAlgorithmFactory(
  providers: Readonly<Record<string, AlgorithmProvider>> = {}
): ProviderAlgorithmFactory {
  return new ProviderAlgorithmFactory(providers)
}
