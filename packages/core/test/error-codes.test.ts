/**
 * Tests for error-codes.ts utility functions
 */

import { describe, it, expect } from 'vitest'
import { ErrorCodes, isValidErrorCode, getErrorCategory } from '../src/error-codes.js'

describe('Error Codes', () => {
  describe('ErrorCodes constant', () => {
    it('should map every key to itself', () => {
      for (const [key, value] of Object.entries(ErrorCodes)) {
        expect(value).toBe(key)
      }
    })

    it('should have encrypt error codes', () => {
      expect(ErrorCodes.ENCRYPT_TABLE_NOT_FOUND).toBe('ENCRYPT_TABLE_NOT_FOUND')
      expect(ErrorCodes.ENCRYPT_ENCRYPTOR_MISSING).toBe('ENCRYPT_ENCRYPTOR_MISSING')
    })

    it('should only carry codes some package raises', () => {
      expect(Object.keys(ErrorCodes)).toEqual([
        'ENCRYPT_CONFIG_INVALID',
        'ENCRYPT_ALGORITHM_NOT_FOUND',
        'ENCRYPT_ALGORITHM_TYPE_MISMATCH',
        'ENCRYPT_TABLE_NOT_FOUND',
        'ENCRYPT_COLUMN_NOT_FOUND',
        'ENCRYPT_ENCRYPTOR_MISSING'
      ])
    })
  })

  describe('isValidErrorCode', () => {
    it('should return true for valid error codes', () => {
      expect(isValidErrorCode('ENCRYPT_CONFIG_INVALID')).toBe(true)
      expect(isValidErrorCode('ENCRYPT_ALGORITHM_TYPE_MISMATCH')).toBe(true)
    })

    it('should return false for invalid error codes', () => {
      expect(isValidErrorCode('INVALID_CODE')).toBe(false)
      expect(isValidErrorCode('')).toBe(false)
      expect(isValidErrorCode('DB_UNKNOWN')).toBe(false)
      expect(isValidErrorCode('encrypt_table_not_found')).toBe(false)
    })
  })

  describe('getErrorCategory', () => {
    it('should extract the prefix before the first underscore', () => {
      expect(getErrorCategory('ENCRYPT_COLUMN_NOT_FOUND')).toBe('ENCRYPT')
      expect(getErrorCategory('ENCRYPT_CONFIG_INVALID')).toBe('ENCRYPT')
    })
  })
})
