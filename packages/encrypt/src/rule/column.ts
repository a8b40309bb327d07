/**
 * Encrypt Column
 *
 * Binds a logical column to its cipher encryptor and optional query encryptors.
 *
 * @module @vaultline/encrypt/rule/column
 */

import type {
  AssistedQueryAlgorithm,
  CipherAlgorithm,
  LikeQueryAlgorithm
} from '../algorithm/types.js'
import { createEncryptContext } from '../context.js'

// ============================================================================
// Column Items
// ============================================================================

/**
 * Cipher binding: physical cipher column plus its reversible encryptor
 *
 * No null short-circuit on any path; the encryptor decides how a null is
 * represented.
 */
export class CipherColumnItem {
  constructor(
    public readonly name: string,
    public readonly encryptor: CipherAlgorithm
  ) {}

  encrypt(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValue: unknown
  ): unknown {
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return this.encryptor.encrypt(originalValue, context)
  }

  /**
   * Encrypt every element, nulls included, preserving length and order
   */
  encryptValues(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    originalValues: readonly unknown[]
  ): unknown[] {
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return originalValues.map(each => this.encryptor.encrypt(each, context))
  }

  decrypt(
    databaseName: string,
    schemaName: string,
    tableName: string,
    logicColumnName: string,
    cipherValue: unknown
  ): unknown {
    const context = createEncryptContext(databaseName, schemaName, tableName, logicColumnName)
    return this.encryptor.decrypt(cipherValue, context)
  }
}

/**
 * Assisted query binding: physical token column plus its encryptor
 */
export class AssistedQueryColumnItem {
  constructor(
    public readonly name: string,
    public readonly encryptor: AssistedQueryAlgorithm
  ) {}
}

/**
 * Like query binding: physical pattern column plus its encryptor
 */
export class LikeQueryColumnItem {
  constructor(
    public readonly name: string,
    public readonly encryptor: LikeQueryAlgorithm
  ) {}
}

// ============================================================================
// Encrypt Column
// ============================================================================

/**
 * Optional query bindings of a column
 */
export interface EncryptColumnQueryItems {
  assistedQuery?: AssistedQueryColumnItem | undefined
  likeQuery?: LikeQueryColumnItem | undefined
}

/**
 * An encrypted logical column
 *
 * Only built by {@link EncryptTable}, after every encryptor reference has
 * been checked against the capability registry.
 */
export class EncryptColumn {
  private readonly cipher: CipherColumnItem
  private readonly assistedQuery: AssistedQueryColumnItem | undefined
  private readonly likeQuery: LikeQueryColumnItem | undefined

  constructor(
    public readonly name: string,
    cipher: CipherColumnItem,
    items: EncryptColumnQueryItems = {}
  ) {
    this.cipher = cipher
    this.assistedQuery = items.assistedQuery
    this.likeQuery = items.likeQuery
  }

  getCipher(): CipherColumnItem {
    return this.cipher
  }

  getAssistedQuery(): AssistedQueryColumnItem | undefined {
    return this.assistedQuery
  }

  getLikeQuery(): LikeQueryColumnItem | undefined {
    return this.likeQuery
  }

  findAssistedQueryEncryptor(): AssistedQueryAlgorithm | undefined {
    return this.assistedQuery?.encryptor
  }

  findLikeQueryEncryptor(): LikeQueryAlgorithm | undefined {
    return this.likeQuery?.encryptor
  }
}
