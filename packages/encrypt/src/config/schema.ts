import { z } from 'zod'

// ============================================================================
// Algorithm Configuration Schema
// ============================================================================

/**
 * Schema for a named encryptor: the algorithm type plus its properties
 */
export const AlgorithmConfigurationSchema = z.object({
  /** Algorithm type resolved by the algorithm factory, e.g. 'AES' */
  type: z.string().min(1, 'Algorithm type is required'),
  /** Algorithm properties, passed to the provider verbatim */
  props: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({})
})

// ============================================================================
// Column / Table Rule Schemas
// ============================================================================

/**
 * Schema for one encryptor binding of a column (cipher, assisted query or like query)
 */
export const EncryptColumnItemSchema = z.object({
  /** Physical storage column; defaults are derived from the logical column name */
  name: z.string().min(1, 'Column name must not be empty').optional(),
  /** Name of a configured encryptor */
  encryptorName: z.string().min(1, 'Encryptor name is required')
})

/**
 * Schema for an encrypted logical column
 */
export const EncryptColumnRuleSchema = z.object({
  /** Logical column name, case preserved */
  name: z.string().min(1, 'Logical column name is required'),
  cipher: EncryptColumnItemSchema,
  assistedQuery: EncryptColumnItemSchema.optional(),
  likeQuery: EncryptColumnItemSchema.optional()
})

/**
 * Schema for a table with encrypted columns
 */
export const EncryptTableRuleSchema = z
  .object({
    /** Logical table name; matched case-insensitively */
    name: z.string().min(1, 'Table name is required'),
    columns: z.array(EncryptColumnRuleSchema)
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>()
    table.columns.forEach((column, index) => {
      if (seen.has(column.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', index, 'name'],
          message: `Duplicate column '${column.name}' in table '${table.name}'`
        })
      }
      seen.add(column.name)
    })
  })

// ============================================================================
// Encrypt Rule Configuration Schema
// ============================================================================

/**
 * Schema for the encrypt rule configuration
 */
export const EncryptRuleConfigurationSchema = z
  .object({
    encryptors: z.record(z.string(), AlgorithmConfigurationSchema),
    tables: z.array(EncryptTableRuleSchema).default([])
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.tables.forEach((table, index) => {
      const key = table.name.toLowerCase()
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tables', index, 'name'],
          message: `Duplicate table '${table.name}'`
        })
      }
      seen.add(key)
    })
  })

// ============================================================================
// Types
// ============================================================================

/** Encryptor configuration as written */
export type AlgorithmConfiguration = z.input<typeof AlgorithmConfigurationSchema>

/** Column encryptor binding as written */
export type EncryptColumnItemConfiguration = z.input<typeof EncryptColumnItemSchema>

/** Column rule as written */
export type EncryptColumnRuleConfiguration = z.input<typeof EncryptColumnRuleSchema>

/** Table rule as written */
export type EncryptTableRuleConfiguration = z.input<typeof EncryptTableRuleSchema>

/** Encrypt rule configuration as written */
export type EncryptRuleConfiguration = z.input<typeof EncryptRuleConfigurationSchema>

/** Encrypt rule configuration after validation and defaults */
export type ParsedEncryptRuleConfiguration = z.output<typeof EncryptRuleConfigurationSchema>

/** Column rule after validation */
export type ParsedEncryptColumnRule = z.output<typeof EncryptColumnRuleSchema>

/** Table rule after validation */
export type ParsedEncryptTableRule = z.output<typeof EncryptTableRuleSchema>
