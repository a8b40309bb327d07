/**
 * Result decryption plugin for Kysely.
 *
 * Decrypts cipher columns of plain single-table selects and exposes them
 * under their logical column names. Predicate and insert rewriting is left
 * to the SQL rewriting layer.
 *
 * Only result keys selected straight from a column are candidates: a
 * `select('nickname as phone_cipher')` keeps its value, and so does a
 * cipher column selected under another name.
 *
 * @module @vaultline/encrypt/plugin
 */

import type {
  Kysely,
  KyselyPlugin,
  PluginTransformQueryArgs,
  PluginTransformResultArgs,
  QueryResult,
  RootOperationNode,
  UnknownRow
} from 'kysely'
import {
  AliasNode,
  ColumnNode,
  IdentifierNode,
  ReferenceNode,
  SelectAllNode,
  SelectQueryNode,
  TableNode
} from 'kysely'
import { silentLogger, type VaultlineLogger } from '@vaultline/core'
import type { EncryptRule } from './rule/rule.js'
import type { EncryptTable } from './rule/table.js'

/**
 * Options for the encrypt result plugin.
 */
export interface EncryptResultPluginOptions {
  /** Database name handed to every decrypt call */
  databaseName: string

  /**
   * Schema name used when the query does not qualify the table.
   * @default 'public'
   */
  schemaName?: string

  /**
   * Logger for plugin messages.
   * @default silentLogger
   */
  logger?: VaultlineLogger
}

/**
 * Table a pending query reads from.
 * @internal
 */
interface QueryTarget {
  schemaName: string
  table: EncryptTable
  selection: SelectedColumns
}

/**
 * Result keys of a select, lower-cased.
 * @internal
 */
interface SelectedColumns {
  all: boolean
  columns: ReadonlySet<string>
  aliases: ReadonlySet<string>
}

/**
 * Encrypt result plugin implementation.
 * @internal
 */
class EncryptResultPlugin implements KyselyPlugin {
  private readonly targets = new WeakMap<object, QueryTarget>()
  private readonly databaseName: string
  private readonly schemaName: string
  private readonly logger: VaultlineLogger

  constructor(
    private readonly rule: EncryptRule,
    options: EncryptResultPluginOptions
  ) {
    this.databaseName = options.databaseName
    this.schemaName = options.schemaName ?? 'public'
    this.logger = options.logger ?? silentLogger
  }

  transformQuery(args: PluginTransformQueryArgs): RootOperationNode {
    const target = this.findTarget(args.node)
    if (target) {
      this.targets.set(args.queryId, target)
    }
    return args.node
  }

  async transformResult(args: PluginTransformResultArgs): Promise<QueryResult<UnknownRow>> {
    // Streams call this once per chunk with the same query id
    const target = this.targets.get(args.queryId)
    if (!target) {
      return args.result
    }

    const rows = args.result.rows.map(row => this.decryptRow(row, target))
    this.logger.debug(`[Encrypt] Decrypted ${rows.length} row(s) of ${target.table.table}`)
    return { ...args.result, rows }
  }

  private findTarget(node: RootOperationNode): QueryTarget | undefined {
    if (!SelectQueryNode.is(node) || node.joins !== undefined) {
      return undefined
    }
    const froms = node.from?.froms ?? []
    const from = froms[0]
    if (froms.length !== 1 || from === undefined || !TableNode.is(from)) {
      return undefined
    }
    const table = this.rule.findEncryptTable(from.table.identifier.name)
    if (!table) {
      return undefined
    }
    return {
      schemaName: from.table.schema?.name ?? this.schemaName,
      table,
      selection: collectSelectedColumns(node)
    }
  }

  private decryptRow(row: UnknownRow, target: QueryTarget): UnknownRow {
    const result: UnknownRow = {}
    for (const [columnName, value] of Object.entries(row)) {
      const logicColumnName = isColumnKey(target.selection, columnName)
        ? target.table.findLogicColumnByCipherColumn(columnName)
        : undefined
      if (logicColumnName === undefined) {
        result[columnName] = value
        continue
      }
      result[logicColumnName] = this.rule.decrypt(
        this.databaseName,
        target.schemaName,
        target.table.table,
        logicColumnName,
        value
      )
    }
    return result
  }
}

function collectSelectedColumns(node: SelectQueryNode): SelectedColumns {
  let all = false
  const columns = new Set<string>()
  const aliases = new Set<string>()

  for (const { selection } of node.selections ?? []) {
    if (SelectAllNode.is(selection)) {
      all = true
    } else if (ColumnNode.is(selection)) {
      columns.add(selection.column.name.toLowerCase())
    } else if (ReferenceNode.is(selection)) {
      if (SelectAllNode.is(selection.column)) {
        all = true
      } else {
        columns.add(selection.column.column.name.toLowerCase())
      }
    } else if (AliasNode.is(selection) && IdentifierNode.is(selection.alias)) {
      aliases.add(selection.alias.name.toLowerCase())
    }
  }

  return { all, columns, aliases }
}

function isColumnKey(selection: SelectedColumns, key: string): boolean {
  const lowerKey = key.toLowerCase()
  if (selection.aliases.has(lowerKey)) {
    return false
  }
  return selection.all || selection.columns.has(lowerKey)
}

/**
 * Create the encrypt result plugin.
 *
 * @example
 * ```typescript
 * const db = new Kysely<Database>({ dialect, plugins: [encryptResultPlugin(rule, { databaseName: 'app' })] })
 *
 * // phone_cipher is decrypted and returned as phone
 * const users = await db.selectFrom('t_user').selectAll().execute()
 * ```
 */
export function encryptResultPlugin(
  rule: EncryptRule,
  options: EncryptResultPluginOptions
): KyselyPlugin {
  return new EncryptResultPlugin(rule, options)
}

/**
 * Wrap a Kysely instance with the encrypt result plugin.
 */
export function withEncryption<DB>(
  db: Kysely<DB>,
  rule: EncryptRule,
  options: EncryptResultPluginOptions
): Kysely<DB> {
  return db.withPlugin(encryptResultPlugin(rule, options))
}
