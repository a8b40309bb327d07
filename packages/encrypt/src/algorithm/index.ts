/**
 * Encrypt algorithm contracts, capability registry and factory
 *
 * @module @vaultline/encrypt/algorithm
 */

export type {
  EncryptCapability,
  AlgorithmProps,
  EncryptAlgorithm,
  CipherAlgorithm,
  AssistedQueryAlgorithm,
  LikeQueryAlgorithm,
  CapabilityAlgorithmMap
} from './types.js'
export { ENCRYPT_CAPABILITIES, CAPABILITY_CONTRACT_NAMES, hasCapability } from './types.js'

export { EncryptorRegistry } from './registry.js'

export type { AlgorithmFactory, AlgorithmProvider } from './factory.js'
export { ProviderAlgorithmFactory, createAlgorithmFactory } from './factory.js'
