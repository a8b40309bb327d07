/**
 * Encrypt rule, tables and columns
 *
 * @module @vaultline/encrypt/rule
 */

export {
  EncryptRule,
  createEncryptRule,
  QueryEncryptorType,
  type EncryptRuleOptions
} from './rule.js'
export { EncryptTable } from './table.js'
export {
  EncryptColumn,
  CipherColumnItem,
  AssistedQueryColumnItem,
  LikeQueryColumnItem,
  type EncryptColumnQueryItems
} from './column.js'
export { TableNamesMapper, type ReadonlyTableNamesMapper } from './table-names.js'
