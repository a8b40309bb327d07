/**
 * Per-call encrypt context
 *
 * @module @vaultline/encrypt/context
 */

/**
 * Location of the value an algorithm is asked to process.
 * Built fresh for every invocation and never stored.
 */
export interface EncryptContext {
  readonly databaseName: string
  readonly schemaName: string
  readonly tableName: string
  readonly columnName: string
}

/**
 * Build a frozen encrypt context
 */
export function createEncryptContext(
  databaseName: string,
  schemaName: string,
  tableName: string,
  columnName: string
): EncryptContext {
  return Object.freeze({ databaseName, schemaName, tableName, columnName })
}
