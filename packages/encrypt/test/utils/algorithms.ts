/**
 * Stub encrypt algorithms with call recording.
 */

import { vi } from 'vitest'
import type {
  AssistedQueryAlgorithm,
  CipherAlgorithm,
  EncryptContext,
  LikeQueryAlgorithm
} from '../../src/index.js'

/** What the stub cipher returns for a null plain value */
export const NULL_CIPHER = 'NULL_CIPHER'

export function createCipherStub(type = 'AES') {
  const encrypt = vi.fn((plainValue: unknown, _context: EncryptContext): unknown =>
    plainValue === null ? NULL_CIPHER : `enc:${String(plainValue)}`
  )
  const decrypt = vi.fn((cipherValue: unknown, _context: EncryptContext): unknown => {
    if (cipherValue === NULL_CIPHER) {
      return null
    }
    if (typeof cipherValue === 'string' && cipherValue.startsWith('enc:')) {
      return cipherValue.slice('enc:'.length)
    }
    return cipherValue
  })
  const algorithm: CipherAlgorithm = { type, capabilities: ['cipher'], encrypt, decrypt }
  return { algorithm, encrypt, decrypt }
}

export function createAssistedQueryStub(type = 'MD5') {
  const encrypt = vi.fn(
    (plainValue: unknown, _context: EncryptContext): unknown => `assist:${String(plainValue)}`
  )
  const algorithm: AssistedQueryAlgorithm = { type, capabilities: ['assisted-query'], encrypt }
  return { algorithm, encrypt }
}

export function createLikeQueryStub(type = 'CHAR_DIGEST_LIKE') {
  const encrypt = vi.fn(
    (plainValue: unknown, _context: EncryptContext): unknown => `like:${String(plainValue)}`
  )
  const algorithm: LikeQueryAlgorithm = { type, capabilities: ['like-query'], encrypt }
  return { algorithm, encrypt }
}
