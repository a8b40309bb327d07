/**
 * Encrypt Algorithm Types
 *
 * Contracts every pluggable encrypt algorithm implements. Algorithms declare
 * what they can do through an explicit `capabilities` descriptor; the rule
 * reads it once when the capability registry is populated.
 *
 * @module @vaultline/encrypt/algorithm/types
 */

import type { EncryptContext } from '../context.js'

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Query capabilities an encrypt algorithm may support
 *
 * - `cipher`: reversible encryption (encrypt + decrypt)
 * - `assisted-query`: deterministic token for equality search
 * - `like-query`: token or pattern for partial-match search
 */
export type EncryptCapability = 'cipher' | 'assisted-query' | 'like-query'

/**
 * All capabilities, in registry order
 */
export const ENCRYPT_CAPABILITIES: readonly EncryptCapability[] = [
  'cipher',
  'assisted-query',
  'like-query'
] as const

/**
 * Algorithm properties as they appear in configuration
 */
export type AlgorithmProps = Readonly<Record<string, string | number | boolean>>

// ============================================================================
// Algorithm Contracts
// ============================================================================

/**
 * Base contract of every encrypt algorithm instance
 */
export interface EncryptAlgorithm {
  /** Algorithm type name, e.g. `AES` */
  readonly type: string

  /** Capabilities this instance supports; may hold more than one */
  readonly capabilities: readonly EncryptCapability[]
}

/**
 * Reversible encryption for the cipher column
 *
 * Receives `null` and `undefined` unchanged: the algorithm decides how an
 * encrypted null is represented.
 */
export interface CipherAlgorithm extends EncryptAlgorithm {
  encrypt(plainValue: unknown, context: EncryptContext): unknown
  decrypt(cipherValue: unknown, context: EncryptContext): unknown
}

/**
 * Deterministic token for equality search over ciphered storage
 *
 * Never called with a nullish value.
 */
export interface AssistedQueryAlgorithm extends EncryptAlgorithm {
  encrypt(plainValue: unknown, context: EncryptContext): unknown
}

/**
 * Token or pattern for LIKE-style search over ciphered storage
 *
 * Never called with a nullish value.
 */
export interface LikeQueryAlgorithm extends EncryptAlgorithm {
  encrypt(plainValue: unknown, context: EncryptContext): unknown
}

/**
 * Maps each capability to the contract an algorithm carrying it fulfils
 */
export interface CapabilityAlgorithmMap {
  cipher: CipherAlgorithm
  'assisted-query': AssistedQueryAlgorithm
  'like-query': LikeQueryAlgorithm
}

/**
 * Contract names reported in type-mismatch errors
 */
export const CAPABILITY_CONTRACT_NAMES: Readonly<Record<EncryptCapability, string>> = {
  cipher: 'CipherAlgorithm',
  'assisted-query': 'AssistedQueryAlgorithm',
  'like-query': 'LikeQueryAlgorithm'
}

// ============================================================================
// Capability Guards
// ============================================================================

/**
 * Check whether an algorithm declares a capability
 *
 * The descriptor is the source of truth; the method shape is checked as well
 * so a mis-declared instance is never bound to a role it cannot serve.
 */
export function hasCapability<C extends EncryptCapability>(
  algorithm: EncryptAlgorithm,
  capability: C
): algorithm is EncryptAlgorithm & CapabilityAlgorithmMap[C] {
  if (!algorithm.capabilities.includes(capability)) {
    return false
  }
  if (!('encrypt' in algorithm) || typeof algorithm.encrypt !== 'function') {
    return false
  }
  if (capability === 'cipher') {
    return 'decrypt' in algorithm && typeof algorithm.decrypt === 'function'
  }
  return true
}
