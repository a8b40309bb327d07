/**
 * Encrypt rule configuration schemas and normalisation
 *
 * @module @vaultline/encrypt/config
 */

export {
  AlgorithmConfigurationSchema,
  EncryptColumnItemSchema,
  EncryptColumnRuleSchema,
  EncryptTableRuleSchema,
  EncryptRuleConfigurationSchema,
  type AlgorithmConfiguration,
  type EncryptColumnItemConfiguration,
  type EncryptColumnRuleConfiguration,
  type EncryptTableRuleConfiguration,
  type EncryptRuleConfiguration,
  type ParsedEncryptRuleConfiguration,
  type ParsedEncryptColumnRule,
  type ParsedEncryptTableRule
} from './schema.js'

export {
  normalizeEncryptRuleConfiguration,
  defineEncryptRule,
  type EncryptRuleConfigurationSource,
  type EncryptRuleDocument,
  type CompatibleEncryptRuleDocument,
  type EncryptRuleInput,
  type NormalizedEncryptRuleConfiguration
} from './normalize.js'
