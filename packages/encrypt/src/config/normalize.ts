/**
 * Configuration normalisation
 *
 * Both the current `encrypt` document and the legacy `compatibleEncrypt`
 * document carry the same fields. They are reduced here to one internal
 * shape before the rule validates any algorithm reference.
 *
 * @module @vaultline/encrypt/config/normalize
 */

import type { ZodIssue } from 'zod'
import { EncryptRuleConfigurationError } from '../errors.js'
import {
  EncryptRuleConfigurationSchema,
  type EncryptRuleConfiguration,
  type ParsedEncryptRuleConfiguration
} from './schema.js'

/**
 * Which document shape a configuration came from
 */
export type EncryptRuleConfigurationSource = 'encrypt' | 'compatible'

/**
 * Current document shape
 */
export interface EncryptRuleDocument {
  encrypt: EncryptRuleConfiguration
}

/**
 * Legacy document shape kept for existing deployments
 *
 * @deprecated Use {@link EncryptRuleDocument}
 */
export interface CompatibleEncryptRuleDocument {
  compatibleEncrypt: EncryptRuleConfiguration
}

/**
 * Every input accepted by the encrypt rule
 */
export type EncryptRuleInput =
  | EncryptRuleConfiguration
  | EncryptRuleDocument
  | CompatibleEncryptRuleDocument

/**
 * Validated configuration the rule is built from
 */
export interface NormalizedEncryptRuleConfiguration extends ParsedEncryptRuleConfiguration {
  readonly source: EncryptRuleConfigurationSource
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function formatIssue(issue: ZodIssue, prefix: string[]): string {
  const path = [...prefix, ...issue.path.map(String)].join('.')
  return `${path || '(root)'}: ${issue.message}`
}

function parseConfiguration(
  value: unknown,
  prefix: string[],
  source: EncryptRuleConfigurationSource
): NormalizedEncryptRuleConfiguration {
  const result = EncryptRuleConfigurationSchema.safeParse(value)
  if (!result.success) {
    const issues = result.error.errors.map(issue => formatIssue(issue, prefix))
    throw new EncryptRuleConfigurationError('Invalid encrypt rule configuration', issues)
  }
  return { source, ...result.data }
}

/**
 * Validate an encrypt rule document and reduce it to the internal shape
 *
 * Accepts `{ encrypt: {...} }`, the legacy `{ compatibleEncrypt: {...} }`,
 * or the bare `{ encryptors, tables }` object.
 *
 * @throws EncryptRuleConfigurationError when the document is malformed
 *
 * @example
 * ```typescript
 * const config = normalizeEncryptRuleConfiguration({
 *   compatibleEncrypt: {
 *     encryptors: { AES: { type: 'AES', props: { 'aes-key-value': 'test-secret' } } },
 *     tables: [{ name: 't_user', columns: [{ name: 'phone', cipher: { encryptorName: 'AES' } }] }]
 *   }
 * })
 * config.source // 'compatible'
 * ```
 */
export function normalizeEncryptRuleConfiguration(input: unknown): NormalizedEncryptRuleConfiguration {
  if (isRecord(input) && 'compatibleEncrypt' in input) {
    return parseConfiguration(input['compatibleEncrypt'], ['compatibleEncrypt'], 'compatible')
  }
  if (isRecord(input) && 'encrypt' in input) {
    return parseConfiguration(input['encrypt'], ['encrypt'], 'encrypt')
  }
  return parseConfiguration(input, [], 'encrypt')
}

/**
 * Type helper for writing an encrypt rule configuration
 */
export function defineEncryptRule(config: EncryptRuleConfiguration): EncryptRuleConfiguration {
  return config
}
