/**
 * Base error hierarchy
 *
 * Uses unified ErrorCodes from @vaultline/core/error-codes for consistency
 * across the entire Vaultline ecosystem.
 */

import type { ErrorCode } from './error-codes.js'

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly detail?: string
  ) {
    super(message)
    this.name = 'DatabaseError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      detail: this.detail
    }
  }
}

/**
 * Type guard for errors raised by Vaultline packages
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
  return error instanceof DatabaseError
}
