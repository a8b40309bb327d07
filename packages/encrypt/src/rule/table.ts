/**
 * Encrypt Table
 *
 * @module @vaultline/encrypt/rule/table
 */

import type { EncryptorRegistry } from '../algorithm/registry.js'
import {
  CAPABILITY_CONTRACT_NAMES,
  type AssistedQueryAlgorithm,
  type CapabilityAlgorithmMap,
  type EncryptCapability,
  type LikeQueryAlgorithm
} from '../algorithm/types.js'
import type { ParsedEncryptColumnRule, ParsedEncryptTableRule } from '../config/schema.js'
import { EncryptColumnNotFoundError, MismatchedEncryptAlgorithmTypeError } from '../errors.js'
import {
  AssistedQueryColumnItem,
  CipherColumnItem,
  EncryptColumn,
  LikeQueryColumnItem
} from './column.js'

/**
 * Role names used in type-mismatch errors
 */
const ROLE_NAMES: Readonly<Record<EncryptCapability, string>> = {
  cipher: 'Cipher',
  'assisted-query': 'Assisted query',
  'like-query': 'Like query'
}

function resolveEncryptor<C extends EncryptCapability>(
  registry: EncryptorRegistry,
  capability: C,
  encryptorName: string
): CapabilityAlgorithmMap[C] {
  const encryptor = registry.resolve(capability, encryptorName)
  if (encryptor === undefined) {
    throw new MismatchedEncryptAlgorithmTypeError(
      ROLE_NAMES[capability],
      encryptorName,
      CAPABILITY_CONTRACT_NAMES[capability]
    )
  }
  return encryptor
}

function createEncryptColumn(
  config: ParsedEncryptColumnRule,
  registry: EncryptorRegistry
): EncryptColumn {
  const cipher = new CipherColumnItem(
    config.cipher.name ?? config.name,
    resolveEncryptor(registry, 'cipher', config.cipher.encryptorName)
  )
  const assistedQuery = config.assistedQuery
    ? new AssistedQueryColumnItem(
        config.assistedQuery.name ?? `${config.name}_assisted`,
        resolveEncryptor(registry, 'assisted-query', config.assistedQuery.encryptorName)
      )
    : undefined
  const likeQuery = config.likeQuery
    ? new LikeQueryColumnItem(
        config.likeQuery.name ?? `${config.name}_like`,
        resolveEncryptor(registry, 'like-query', config.likeQuery.encryptorName)
      )
    : undefined
  return new EncryptColumn(config.name, cipher, { assistedQuery, likeQuery })
}

/**
 * A table with encrypted columns
 *
 * Columns are validated in declaration order; the first unresolvable
 * encryptor reference aborts construction. Column names are matched exactly.
 *
 * @example
 * ```typescript
 * const table = new EncryptTable(
 *   { name: 't_user', columns: [{ name: 'phone', cipher: { encryptorName: 'AES' } }] },
 *   registry
 * )
 * table.getEncryptColumn('phone').getCipher().encryptor // AES instance
 * ```
 */
export class EncryptTable {
  public readonly table: string
  private readonly columns = new Map<string, EncryptColumn>()

  constructor(config: ParsedEncryptTableRule, registry: EncryptorRegistry) {
    this.table = config.name
    for (const columnConfig of config.columns) {
      this.columns.set(columnConfig.name, createEncryptColumn(columnConfig, registry))
    }
  }

  /**
   * Check whether a logical column is encrypted
   */
  isEncryptColumn(logicColumnName: string): boolean {
    return this.columns.has(logicColumnName)
  }

  findEncryptColumn(logicColumnName: string): EncryptColumn | undefined {
    return this.columns.get(logicColumnName)
  }

  /**
   * @throws EncryptColumnNotFoundError when the column is not encrypted
   */
  getEncryptColumn(logicColumnName: string): EncryptColumn {
    const column = this.columns.get(logicColumnName)
    if (!column) {
      throw new EncryptColumnNotFoundError(this.table, logicColumnName)
    }
    return column
  }

  /**
   * Logical column names in declaration order
   */
  getLogicColumns(): string[] {
    return Array.from(this.columns.keys())
  }

  /**
   * Encrypt columns in declaration order
   */
  getEncryptColumns(): EncryptColumn[] {
    return Array.from(this.columns.values())
  }

  findAssistedQueryEncryptor(logicColumnName: string): AssistedQueryAlgorithm | undefined {
    return this.columns.get(logicColumnName)?.findAssistedQueryEncryptor()
  }

  findLikeQueryEncryptor(logicColumnName: string): LikeQueryAlgorithm | undefined {
    return this.columns.get(logicColumnName)?.findLikeQueryEncryptor()
  }

  /**
   * Check whether a physical column holds ciphertext (case-insensitive)
   */
  isCipherColumn(columnName: string): boolean {
    return this.findLogicColumnByCipherColumn(columnName) !== undefined
  }

  /**
   * Find the logical column stored in a physical cipher column (case-insensitive)
   */
  findLogicColumnByCipherColumn(cipherColumnName: string): string | undefined {
    const target = cipherColumnName.toLowerCase()
    for (const [logicColumnName, column] of this.columns) {
      if (column.getCipher().name.toLowerCase() === target) {
        return logicColumnName
      }
    }
    return undefined
  }

  /**
   * Find the logical column an assisted query column belongs to (case-insensitive)
   */
  findLogicColumnByAssistedQueryColumn(assistedQueryColumnName: string): string | undefined {
    const target = assistedQueryColumnName.toLowerCase()
    for (const [logicColumnName, column] of this.columns) {
      if (column.getAssistedQuery()?.name.toLowerCase() === target) {
        return logicColumnName
      }
    }
    return undefined
  }
}
