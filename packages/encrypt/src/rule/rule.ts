/**
 * Encrypt Rule
 *
 * Top-level assembly of the column encryption feature: classifies the
 * configured encryptors, validates every table against them, and dispatches
 * encrypt / decrypt / query-token requests from the SQL rewriting layer.
 *
 * @module @vaultline/encrypt/rule
 */

import { silentLogger, type VaultlineLogger } from '@vaultline/core'
import type { AlgorithmFactory } from '../algorithm/factory.js'
import { EncryptorRegistry } from '../algorithm/registry.js'
import type {
  AssistedQueryAlgorithm,
  EncryptCapability,
  LikeQueryAlgorithm
} from '../algorithm/types.js'
import {
  normalizeEncryptRuleConfiguration,
  type EncryptRuleInput,
  type NormalizedEncryptRuleConfiguration
} from '../config/normalize.js'
import { createEncryptContext, type EncryptContext } from '../context.js'
import { EncryptTableNotFoundError, MissingEncryptorError } from '../errors.js'
import { EncryptTable } from './table.js'
import { TableNamesMapper, type ReadonlyTableNamesMapper } from './table-names.js'

/**
 * Encrypt rule construction options
 */
export interface EncryptRuleOptions {
  /** Creates algorithm instances from configured `{ type, props }` */
  algorithmFactory: AlgorithmFactory

  /** Logger for rule assembly */
  logger?: VaultlineLogger
}

/**
 * Query-token encryptor types, as reported by MissingEncryptorError
 */
export const QueryEncryptorType = {
  ASSIST_QUERY: 'ASSIST_QUERY',
  LIKE_QUERY: 'LIKE_QUERY'
} as const

type QueryEncryptor = AssistedQueryAlgorithm | LikeQueryAlgorithm

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

/**
 * Encrypt Rule
 *
 * Immutable once constructed: a configuration change means building a new
 * rule and swapping the reference. Construction either completes or throws;
 * the first misconfigured column aborts the whole build.
 *
 * Cipher operations pass nullish values to the encryptor untouched.
 * Assisted and like query operations return nullish values as they are,
 * without calling the encryptor.
 *
 * @example
 * ```typescript
 * const rule = new EncryptRule(
 *   {
 *     encryptors: {
 *       AES: { type: 'AES', props: { 'aes-key-value': 'test-secret' } },
 *       ASSIST: { type: 'MD5' }
 *     },
 *     tables: [
 *       {
 *         name: 't_user',
 *         columns: [
 *           {
 *             name: 'phone',
 *             cipher: { name: 'phone_cipher', encryptorName: 'AES' },
 *             assistedQuery: { name: 'phone_assisted', encryptorName: 'ASSIST' }
 *           }
 *         ]
 *       }
 *     ]
 *   },
 *   { algorithmFactory }
 * )
 *
 * rule.encrypt('app', 'public', 't_user', 'phone', '13800000000')
 * rule.getEncryptAssistedQueryValue('app', 'public', 'T_USER', 'phone', '13800000000')
 * ```
 */
export class EncryptRule {
  /** The validated configuration this rule was built from */
  public readonly configuration: NormalizedEncryptRuleConfiguration

  private readonly encryptors: EncryptorRegistry
  private readonly tables = new Map<string, EncryptTable>()
  private readonly tableNamesMapper = new TableNamesMapper()
  private readonly logger: VaultlineLogger

  constructor(input: EncryptRuleInput, options: EncryptRuleOptions) {
    this.logger = options.logger ?? silentLogger
    this.configuration = normalizeEncryptRuleConfiguration(input)
    if (this.configuration.source === 'compatible') {
      this.logger.warn(
        '[Encrypt] Building rule from deprecated compatibleEncrypt configuration; migrate to encrypt'
      )
    }

    this.encryptors = new EncryptorRegistry({ logger: this.logger })
    for (const [name, algorithmConfig] of Object.entries(this.configuration.encryptors)) {
      const algorithm = options.algorithmFactory.create(algorithmConfig.type, algorithmConfig.props)
      this.encryptors.classify(name, algorithm)
    }

    for (const tableConfig of this.configuration.tables) {
      this.tables.set(tableConfig.name.toLowerCase(), new EncryptTable(tableConfig, this.encryptors))
      this.tableNamesMapper.put(tableConfig.name)
      this.logger.info(`[Encrypt] Registered table: ${tableConfig.name}`, {
        columns: tableConfig.columns.length
      })
    }
  }

  // ============================================================================
  // Table Lookup
  // ============================================================================

  /**
   * Find an encrypt table (case-insensitive)
   */
  findEncryptTable(tableName: string): EncryptTable | undefined {
    return this.tables.get(tableName.toLowerCase())
  }

  /**
   * Get an encrypt table (case-insensitive)
   *
   * @throws EncryptTableNotFoundError when the table is not part of this rule
   */
  getEncryptTable(tableName: string): EncryptTable {
    const table = this.findEncryptTable(tableName)
    if (!table) {
      throw new EncryptTableNotFoundError(tableName)
    }
    return table
  }

  /**
   * All encrypt tables in configuration order
   */
  getEncryptTables(): EncryptTable[] {
    return Array.from(this.tables.values())
  }

  /**
   * Encryptor names registered under a capability
   */
  getEncryptorNames(capability: EncryptCapability): string[] {
    return this.encryptors.getNames(capability)
  }

  // ============================================================================
  // Cipher Dispatch
  // ============================================================================

  /**
   * Encrypt a value with the column's cipher encryptor
   *
   * @throws EncryptTableNotFoundError
   * @throws EncryptColumnNotFoundError
   */
  encrypt(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValue: unknown
  ): unknown {
    const column = this.getEncryptTable(tableName).getEncryptColumn(logicColumnName)
    return column
      .getCipher()
      .encrypt(databaseName, schemaName, tableName, logicColumnName, originalValue)
  }

  /**
   * Encrypt a list of values; the result has the same length and order
   *
   * @throws EncryptTableNotFoundError
   * @throws EncryptColumnNotFoundError
   */
  encryptValues(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValues: readonly unknown[]
  ): unknown[] {
    const column = this.getEncryptTable(tableName).getEncryptColumn(logicColumnName)
    return column
      .getCipher()
      .encryptValues(databaseName, schemaName, tableName, logicColumnName, originalValues)
  }

  /**
   * Decrypt a value with the column's cipher encryptor
   *
   * @throws EncryptTableNotFoundError
   * @throws EncryptColumnNotFoundError
   */
  decrypt(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    cipherValue: unknown
  ): unknown {
    const column = this.getEncryptTable(tableName).getEncryptColumn(logicColumnName)
    return column
      .getCipher()
      .decrypt(databaseName, schemaName, tableName, logicColumnName, cipherValue)
  }

  // ============================================================================
  // Assisted Query Dispatch
  // ============================================================================

  /**
   * Compute the assisted query token of a value
   *
   * @throws EncryptTableNotFoundError
   * @throws MissingEncryptorError when the column has no assisted query encryptor
   */
  getEncryptAssistedQueryValue(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValue: unknown
  ): unknown {
    if (isAbsent(originalValue)) {
      return originalValue
    }
    const encryptor = this.getAssistedQueryEncryptor(tableName, logicColumnName)
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return encryptor.encrypt(originalValue, context)
  }

  /**
   * Compute assisted query tokens; nullish elements stay in place untouched
   *
   * @throws EncryptTableNotFoundError
   * @throws MissingEncryptorError when the column has no assisted query encryptor
   */
  getEncryptAssistedQueryValues(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValues: readonly unknown[]
  ): unknown[] {
    const encryptor = this.getAssistedQueryEncryptor(tableName, logicColumnName)
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return this.encryptQueryValues(encryptor, originalValues, context)
  }

  // ============================================================================
  // Like Query Dispatch
  // ============================================================================

  /**
   * Compute the like query token of a value
   *
   * @throws EncryptTableNotFoundError
   * @throws MissingEncryptorError when the column has no like query encryptor
   */
  getEncryptLikeQueryValue(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValue: unknown
  ): unknown {
    if (isAbsent(originalValue)) {
      return originalValue
    }
    const encryptor = this.getLikeQueryEncryptor(tableName, logicColumnName)
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return encryptor.encrypt(originalValue, context)
  }

  /**
   * Compute like query tokens; nullish elements stay in place untouched
   *
   * @throws EncryptTableNotFoundError
   * @throws MissingEncryptorError when the column has no like query encryptor
   */
  getEncryptLikeQueryValues(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValues: readonly unknown[]
  ): unknown[] {
    const encryptor = this.getLikeQueryEncryptor(tableName, logicColumnName)
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return this.encryptQueryValues(encryptor, originalValues, context)
  }

  // ============================================================================
  // Rule Framework Accessors
  // ============================================================================

  /**
   * Logical tables carrying encrypted columns
   */
  getLogicTableMapper(): ReadonlyTableNamesMapper {
    return this.tableNamesMapper
  }

  /**
   * Always empty: encryption never renames tables
   */
  getActualTableMapper(): ReadonlyTableNamesMapper {
    return new TableNamesMapper()
  }

  /**
   * Always empty: encryption never distributes tables
   */
  getDistributedTableMapper(): ReadonlyTableNamesMapper {
    return new TableNamesMapper()
  }

  /**
   * Same index as {@link getLogicTableMapper}
   */
  getEnhancedTableMapper(): ReadonlyTableNamesMapper {
    return this.getLogicTableMapper()
  }

  getType(): string {
    return 'EncryptRule'
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private getAssistedQueryEncryptor(
    tableName: string,
    logicColumnName: string
  ): AssistedQueryAlgorithm {
    const encryptor = this.getEncryptTable(tableName).findAssistedQueryEncryptor(logicColumnName)
    if (!encryptor) {
      throw new MissingEncryptorError(tableName, logicColumnName, QueryEncryptorType.ASSIST_QUERY)
    }
    return encryptor
  }

  private getLikeQueryEncryptor(tableName: string, logicColumnName: string): LikeQueryAlgorithm {
    const encryptor = this.getEncryptTable(tableName).findLikeQueryEncryptor(logicColumnName)
    if (!encryptor) {
      throw new MissingEncryptorError(tableName, logicColumnName, QueryEncryptorType.LIKE_QUERY)
    }
    return encryptor
  }

  private encryptQueryValues(
    encryptor: QueryEncryptor,
    originalValues: readonly unknown[],
    context: EncryptContext
  ): unknown[] {
    return originalValues.map(each => (isAbsent(each) ? each : encryptor.encrypt(each, context)))
  }
}

/**
 * Create an encrypt rule
 */
export function createEncryptRule(input: EncryptRuleInput, options: EncryptRuleOptions): EncryptRule {
  return new EncryptRule(input, options)
}
