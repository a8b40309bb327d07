/**
 * Encryptor Capability Registry
 *
 * Classifies configured algorithm instances into one map per capability.
 *
 * @module @vaultline/encrypt/algorithm/registry
 */

import { silentLogger, type VaultlineLogger } from '@vaultline/core'
import {
  ENCRYPT_CAPABILITIES,
  hasCapability,
  type CapabilityAlgorithmMap,
  type EncryptAlgorithm,
  type EncryptCapability
} from './types.js'

type CapabilityMaps = {
  [C in EncryptCapability]: Map<string, CapabilityAlgorithmMap[C]>
}

/**
 * Encryptor Registry
 *
 * Holds three name-keyed maps (cipher, assisted query, like query). An
 * instance declaring several capabilities is inserted into each matching map
 * under the same name. Lookups never throw; absence is `undefined`.
 *
 * @example
 * ```typescript
 * const registry = new EncryptorRegistry()
 * registry.classify('AES', aesAlgorithm)
 *
 * registry.resolve('cipher', 'AES')          // aesAlgorithm
 * registry.resolve('assisted-query', 'AES')  // undefined
 * ```
 */
export class EncryptorRegistry {
  private readonly maps: CapabilityMaps = {
    cipher: new Map(),
    'assisted-query': new Map(),
    'like-query': new Map()
  }
  private readonly logger: VaultlineLogger

  constructor(options?: { logger?: VaultlineLogger }) {
    this.logger = options?.logger ?? silentLogger
  }

  /**
   * Insert an algorithm into every capability map it qualifies for
   *
   * @returns Capabilities the algorithm was registered under
   */
  classify(name: string, algorithm: EncryptAlgorithm): EncryptCapability[] {
    const registered: EncryptCapability[] = []
    if (hasCapability(algorithm, 'cipher')) {
      this.maps.cipher.set(name, algorithm)
      registered.push('cipher')
    }
    if (hasCapability(algorithm, 'assisted-query')) {
      this.maps['assisted-query'].set(name, algorithm)
      registered.push('assisted-query')
    }
    if (hasCapability(algorithm, 'like-query')) {
      this.maps['like-query'].set(name, algorithm)
      registered.push('like-query')
    }
    this.logger.debug(`[Encrypt] Classified encryptor: ${name}`, {
      type: algorithm.type,
      capabilities: registered
    })
    return registered
  }

  /**
   * Look up an algorithm by capability and configured name
   */
  resolve<C extends EncryptCapability>(
    capability: C,
    name: string
  ): CapabilityAlgorithmMap[C] | undefined {
    const map: Map<string, CapabilityAlgorithmMap[C]> = this.maps[capability]
    return map.get(name)
  }

  /**
   * Check whether a name is registered under a capability
   */
  has(capability: EncryptCapability, name: string): boolean {
    return this.maps[capability].has(name)
  }

  /**
   * Names registered under a capability, in registration order
   */
  getNames(capability: EncryptCapability): string[] {
    return Array.from(this.maps[capability].keys())
  }

  /**
   * Capabilities a name is registered under
   */
  getCapabilities(name: string): EncryptCapability[] {
    return ENCRYPT_CAPABILITIES.filter(capability => this.maps[capability].has(name))
  }
}
