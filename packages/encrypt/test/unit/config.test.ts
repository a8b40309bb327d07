/**
 * Configuration Normalisation Tests
 *
 * Current and legacy document shapes reduce to one internal configuration.
 */

import { describe, it, expect } from 'vitest'
import {
  normalizeEncryptRuleConfiguration,
  defineEncryptRule,
  EncryptRuleConfigurationError,
  EncryptErrorCodes
} from '../../src/index.js'

const config = defineEncryptRule({
  encryptors: {
    AES: { type: 'AES', props: { 'aes-key-value': 'test-secret' } },
    ASSIST: { type: 'MD5' }
  },
  tables: [
    {
      name: 't_user',
      columns: [
        {
          name: 'phone',
          cipher: { name: 'phone_cipher', encryptorName: 'AES' },
          assistedQuery: { encryptorName: 'ASSIST' }
        }
      ]
    }
  ]
})

function captureIssues(input: unknown): string[] {
  try {
    normalizeEncryptRuleConfiguration(input)
  } catch (error) {
    if (error instanceof EncryptRuleConfigurationError) {
      return error.issues
    }
    throw error
  }
  return []
}

describe('normalizeEncryptRuleConfiguration', () => {
  describe('document shapes', () => {
    it('should accept the bare configuration', () => {
      const normalized = normalizeEncryptRuleConfiguration(config)

      expect(normalized.source).toBe('encrypt')
      expect(normalized.tables).toHaveLength(1)
      expect(Object.keys(normalized.encryptors)).toEqual(['AES', 'ASSIST'])
    })

    it('should accept the encrypt wrapper', () => {
      const normalized = normalizeEncryptRuleConfiguration({ encrypt: config })

      expect(normalized.source).toBe('encrypt')
      expect(normalized.tables[0]?.name).toBe('t_user')
    })

    it('should reduce the legacy compatibleEncrypt wrapper to the same shape', () => {
      const current = normalizeEncryptRuleConfiguration({ encrypt: config })
      const legacy = normalizeEncryptRuleConfiguration({ compatibleEncrypt: config })

      expect(legacy.source).toBe('compatible')
      expect(legacy.encryptors).toEqual(current.encryptors)
      expect(legacy.tables).toEqual(current.tables)
    })
  })

  describe('defaults', () => {
    it('should default encryptor props to an empty object', () => {
      const normalized = normalizeEncryptRuleConfiguration(config)

      expect(normalized.encryptors['ASSIST']).toEqual({ type: 'MD5', props: {} })
    })

    it('should default tables to an empty list', () => {
      const normalized = normalizeEncryptRuleConfiguration({ encryptors: {} })

      expect(normalized.tables).toEqual([])
    })
  })

  describe('validation', () => {
    it('should reject a column without cipher binding', () => {
      const issues = captureIssues({
        encryptors: {},
        tables: [{ name: 't_user', columns: [{ name: 'phone' }] }]
      })

      expect(issues).toEqual(['tables.0.columns.0.cipher: Required'])
    })

    it('should prefix issue paths with the wrapper key', () => {
      const issues = captureIssues({ compatibleEncrypt: { tables: [] } })

      expect(issues).toEqual(['compatibleEncrypt.encryptors: Required'])
    })

    it('should reject an empty encryptor name', () => {
      const issues = captureIssues({
        encryptors: {},
        tables: [{ name: 't_user', columns: [{ name: 'phone', cipher: { encryptorName: '' } }] }]
      })

      expect(issues).toEqual(['tables.0.columns.0.cipher.encryptorName: Encryptor name is required'])
    })

    it('should reject duplicate table names regardless of case', () => {
      const issues = captureIssues({
        encryptors: {},
        tables: [
          { name: 't_user', columns: [] },
          { name: 'T_USER', columns: [] }
        ]
      })

      expect(issues).toEqual(["tables.1.name: Duplicate table 'T_USER'"])
    })

    it('should reject duplicate column names within a table', () => {
      const issues = captureIssues({
        encryptors: {},
        tables: [
          {
            name: 't_user',
            columns: [
              { name: 'phone', cipher: { encryptorName: 'AES' } },
              { name: 'phone', cipher: { encryptorName: 'AES' } }
            ]
          }
        ]
      })

      expect(issues).toEqual(["tables.0.columns.1.name: Duplicate column 'phone' in table 't_user'"])
    })

    it('should report a non-object document at the root', () => {
      const issues = captureIssues('not a config')

      expect(issues).toEqual(['(root): Expected object, received string'])
    })

    it('should carry the configuration error code', () => {
      expect(() => normalizeEncryptRuleConfiguration(null)).toThrow(EncryptRuleConfigurationError)
      try {
        normalizeEncryptRuleConfiguration(null)
      } catch (error) {
        expect(error).toMatchObject({ code: EncryptErrorCodes.ENCRYPT_CONFIG_INVALID })
      }
    })
  })
})
