/**
 * @vaultline/core - Core utilities for Vaultline
 *
 * Minimal core package shared by the Vaultline packages:
 * - Error handling (DatabaseError, error codes)
 * - Logger interface
 *
 * **Related packages:**
 * - `@vaultline/encrypt` - Column encryption rule and Kysely plugin
 *
 * @module @vaultline/core
 */

// Error handling
export * from './errors.js'
export * from './error-codes.js'

// Logger
export * from './logger.js'
