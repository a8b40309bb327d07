/**
 * @vaultline/encrypt - Column encryption rule for Vaultline
 *
 * Binds logical table columns to pluggable cipher, assisted-query and
 * like-query encryptors, validates the binding once, and dispatches
 * encrypt / decrypt / query-token requests.
 *
 * @packageDocumentation
 */

// ============================================================================
// Rule
// ============================================================================

export {
  EncryptRule,
  createEncryptRule,
  QueryEncryptorType,
  EncryptTable,
  EncryptColumn,
  CipherColumnItem,
  AssistedQueryColumnItem,
  LikeQueryColumnItem,
  TableNamesMapper,
  type EncryptRuleOptions,
  type EncryptColumnQueryItems,
  type ReadonlyTableNamesMapper
} from './rule/index.js'

// ============================================================================
// Algorithms
// ============================================================================

export {
  ENCRYPT_CAPABILITIES,
  CAPABILITY_CONTRACT_NAMES,
  hasCapability,
  EncryptorRegistry,
  ProviderAlgorithmFactory,
  createAlgorithmFactory,
  type EncryptCapability,
  type AlgorithmProps,
  type EncryptAlgorithm,
  type CipherAlgorithm,
  type AssistedQueryAlgorithm,
  type LikeQueryAlgorithm,
  type CapabilityAlgorithmMap,
  type AlgorithmFactory,
  type AlgorithmProvider
} from './algorithm/index.js'

export { createEncryptContext, type EncryptContext } from './context.js'

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js'

// ============================================================================
// Plugin
// ============================================================================

export {
  encryptResultPlugin,
  withEncryption,
  type EncryptResultPluginOptions
} from './plugin.js'

// ============================================================================
// Errors
// ============================================================================

export {
  EncryptError,
  EncryptRuleConfigurationError,
  EncryptAlgorithmNotFoundError,
  MismatchedEncryptAlgorithmTypeError,
  EncryptTableNotFoundError,
  EncryptColumnNotFoundError,
  MissingEncryptorError,
  EncryptErrorCodes,
  type EncryptErrorCode
} from './errors.js'
