/**
 * Algorithm Factory Tests
 */

import { describe, it, expect, vi } from 'vitest'
import {
  createAlgorithmFactory,
  EncryptAlgorithmNotFoundError,
  EncryptErrorCodes
} from '../../src/index.js'
import { createAssistedQueryStub, createCipherStub } from '../utils/algorithms.js'

describe('ProviderAlgorithmFactory', () => {
  it('should create an algorithm through its provider with the configured props', () => {
    const { algorithm } = createCipherStub()
    const provider = vi.fn(() => algorithm)
    const factory = createAlgorithmFactory({ AES: provider })

    const created = factory.create('AES', { 'aes-key-value': 'test-secret' })

    expect(created).toBe(algorithm)
    expect(provider).toHaveBeenCalledWith({ 'aes-key-value': 'test-secret' })
  })

  it('should match type names case-insensitively', () => {
    const { algorithm } = createAssistedQueryStub()
    const factory = createAlgorithmFactory({ md5: () => algorithm })

    expect(factory.create('MD5', {})).toBe(algorithm)
    expect(factory.hasProvider('Md5')).toBe(true)
    expect(factory.getTypes()).toEqual(['MD5'])
  })

  it('should accept providers registered after construction', () => {
    const factory = createAlgorithmFactory()
    const { algorithm } = createCipherStub('SM4')

    factory.registerProvider('SM4', () => algorithm)

    expect(factory.create('sm4', {})).toBe(algorithm)
  })

  it('should throw EncryptAlgorithmNotFoundError for unknown types', () => {
    const factory = createAlgorithmFactory({ AES: () => createCipherStub().algorithm })

    expect(() => factory.create('DES', {})).toThrow(EncryptAlgorithmNotFoundError)
    try {
      factory.create('DES', {})
    } catch (error) {
      expect(error).toBeInstanceOf(EncryptAlgorithmNotFoundError)
      if (error instanceof EncryptAlgorithmNotFoundError) {
        expect(error.algorithmType).toBe('DES')
        expect(error.code).toBe(EncryptErrorCodes.ENCRYPT_ALGORITHM_NOT_FOUND)
        expect(error.message).toBe("Encrypt algorithm type 'DES' is not registered. Registered: AES")
      }
    }
  })
})
