/**
 * Unified error codes for the Vaultline ecosystem
 *
 * Every error raised by a Vaultline package carries one of these codes.
 * Codes are namespaced by category: `<CATEGORY>_<CONDITION>`.
 *
 * @module @vaultline/core/error-codes
 */

export const ErrorCodes = {
  ENCRYPT_CONFIG_INVALID: 'ENCRYPT_CONFIG_INVALID',
  ENCRYPT_ALGORITHM_NOT_FOUND: 'ENCRYPT_ALGORITHM_NOT_FOUND',
  ENCRYPT_ALGORITHM_TYPE_MISMATCH: 'ENCRYPT_ALGORITHM_TYPE_MISMATCH',
  ENCRYPT_TABLE_NOT_FOUND: 'ENCRYPT_TABLE_NOT_FOUND',
  ENCRYPT_COLUMN_NOT_FOUND: 'ENCRYPT_COLUMN_NOT_FOUND',
  ENCRYPT_ENCRYPTOR_MISSING: 'ENCRYPT_ENCRYPTOR_MISSING'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

const ERROR_CODE_SET: ReadonlySet<string> = new Set(Object.values(ErrorCodes))

/**
 * Check whether a string is one of the unified error codes
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return ERROR_CODE_SET.has(code)
}

/**
 * Extract the category prefix of an error code
 *
 * @example
 * ```typescript
 * getErrorCategory('ENCRYPT_TABLE_NOT_FOUND') // 'ENCRYPT'
 * ```
 */
export function getErrorCategory(code: ErrorCode): string {
  const separator = code.indexOf('_')
  return separator === -1 ? code : code.slice(0, separator)
}
