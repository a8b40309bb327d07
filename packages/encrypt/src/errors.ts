/**
 * Encrypt Error Classes
 *
 * All errors extend DatabaseError from @vaultline/core so callers can catch
 * the whole family with one `instanceof` check and serialize it with `toJSON()`.
 * Every condition here is synchronous and non-retryable.
 *
 * @module @vaultline/encrypt/errors
 */

import { DatabaseError, ErrorCodes } from '@vaultline/core'

// ============================================================================
// Encrypt Error Codes
// ============================================================================

/**
 * Encrypt-specific error codes
 */
export const EncryptErrorCodes = {
  /** Configuration document failed schema validation */
  ENCRYPT_CONFIG_INVALID: ErrorCodes.ENCRYPT_CONFIG_INVALID,
  /** No algorithm provider registered for a type */
  ENCRYPT_ALGORITHM_NOT_FOUND: ErrorCodes.ENCRYPT_ALGORITHM_NOT_FOUND,
  /** A column references an encryptor lacking the capability its role needs */
  ENCRYPT_ALGORITHM_TYPE_MISMATCH: ErrorCodes.ENCRYPT_ALGORITHM_TYPE_MISMATCH,
  /** Table is not part of the encrypt rule */
  ENCRYPT_TABLE_NOT_FOUND: ErrorCodes.ENCRYPT_TABLE_NOT_FOUND,
  /** Column is not encrypted in its table */
  ENCRYPT_COLUMN_NOT_FOUND: ErrorCodes.ENCRYPT_COLUMN_NOT_FOUND,
  /** Column has no encryptor bound for the requested query role */
  ENCRYPT_ENCRYPTOR_MISSING: ErrorCodes.ENCRYPT_ENCRYPTOR_MISSING
} as const

export type EncryptErrorCode = (typeof EncryptErrorCodes)[keyof typeof EncryptErrorCodes]

// ============================================================================
// Base Encrypt Error
// ============================================================================

/**
 * Base class for all encrypt-related errors
 */
export class EncryptError extends DatabaseError {
  constructor(message: string, code: EncryptErrorCode, detail?: string) {
    super(message, code, detail)
    this.name = 'EncryptError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Error thrown when an encrypt rule configuration is structurally invalid
 *
 * Raised before any algorithm is created. `issues` lists every failed check
 * as `path: message`.
 *
 * @example
 * ```typescript
 * normalizeEncryptRuleConfiguration({ encrypt: { tables: [] } })
 * // EncryptRuleConfigurationError: Invalid encrypt rule configuration
 * //   issues: ['encrypt.encryptors: Required']
 * ```
 */
export class EncryptRuleConfigurationError extends EncryptError {
  public readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message, EncryptErrorCodes.ENCRYPT_CONFIG_INVALID, issues.join('; ') || undefined)
    this.name = 'EncryptRuleConfigurationError'
    this.issues = issues
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues
    }
  }
}

/**
 * Error thrown when the algorithm factory has no provider for a type
 */
export class EncryptAlgorithmNotFoundError extends EncryptError {
  public readonly algorithmType: string

  constructor(algorithmType: string, knownTypes: string[] = []) {
    const known = knownTypes.length > 0 ? ` Registered: ${knownTypes.join(', ')}` : ''
    super(
      `Encrypt algorithm type '${algorithmType}' is not registered.${known}`,
      EncryptErrorCodes.ENCRYPT_ALGORITHM_NOT_FOUND
    )
    this.name = 'EncryptAlgorithmNotFoundError'
    this.algorithmType = algorithmType
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      algorithmType: this.algorithmType
    }
  }
}

/**
 * Error thrown when a column's encryptor does not carry the capability
 * required by the role it is configured for
 *
 * Fatal for the whole rule build.
 *
 * @example
 * ```typescript
 * // 'MD5' only declares 'assisted-query' but is used as a cipher
 * throw new MismatchedEncryptAlgorithmTypeError('Cipher', 'MD5', 'CipherAlgorithm')
 * ```
 */
export class MismatchedEncryptAlgorithmTypeError extends EncryptError {
  public readonly role: string
  public readonly encryptorName: string
  public readonly expectedType: string

  constructor(role: string, encryptorName: string, expectedType: string) {
    super(
      `${role} encryptor '${encryptorName}' is not a ${expectedType}`,
      EncryptErrorCodes.ENCRYPT_ALGORITHM_TYPE_MISMATCH
    )
    this.name = 'MismatchedEncryptAlgorithmTypeError'
    this.role = role
    this.encryptorName = encryptorName
    this.expectedType = expectedType
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      role: this.role,
      encryptorName: this.encryptorName,
      expectedType: this.expectedType
    }
  }
}

// ============================================================================
// Dispatch Errors
// ============================================================================

/**
 * Error thrown when a dispatch call names a table outside the encrypt rule
 */
export class EncryptTableNotFoundError extends EncryptError {
  public readonly table: string

  constructor(table: string) {
    super(`Encrypt table '${table}' does not exist`, EncryptErrorCodes.ENCRYPT_TABLE_NOT_FOUND)
    this.name = 'EncryptTableNotFoundError'
    this.table = table
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      table: this.table
    }
  }
}

/**
 * Error thrown when a cipher operation names a column the table does not encrypt
 */
export class EncryptColumnNotFoundError extends EncryptError {
  public readonly table: string
  public readonly column: string

  constructor(table: string, column: string) {
    super(
      `Encrypt column '${column}' does not exist in table '${table}'`,
      EncryptErrorCodes.ENCRYPT_COLUMN_NOT_FOUND
    )
    this.name = 'EncryptColumnNotFoundError'
    this.table = table
    this.column = column
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      table: this.table,
      column: this.column
    }
  }
}

/**
 * Error thrown when an assisted-query or like-query operation targets a
 * column that was never bound to an encryptor for that role
 *
 * `encryptorType` is `ASSIST_QUERY` or `LIKE_QUERY`.
 */
export class MissingEncryptorError extends EncryptError {
  public readonly table: string
  public readonly column: string
  public readonly encryptorType: string

  constructor(table: string, column: string, encryptorType: string) {
    super(
      `Can not find ${encryptorType} encryptor of column '${column}' in table '${table}'`,
      EncryptErrorCodes.ENCRYPT_ENCRYPTOR_MISSING
    )
    this.name = 'MissingEncryptorError'
    this.table = table
    this.column = column
    this.encryptorType = encryptorType
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      table: this.table,
      column: this.column,
      encryptorType: this.encryptorType
    }
  }
}
