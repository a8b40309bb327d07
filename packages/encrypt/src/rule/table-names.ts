/**
 * Case-insensitive table name index
 *
 * Lookups fold to lower case; the first-seen original casing is kept for
 * display. Enumeration follows insertion order.
 *
 * @example
 * ```typescript
 * const mapper = new TableNamesMapper()
 * mapper.put('T_User')
 * mapper.contains('t_user')     // true
 * mapper.getTableNames()        // ['T_User']
 * ```
 */
export class TableNamesMapper {
  private readonly names = new Map<string, string>()

  constructor(tableNames: Iterable<string> = []) {
    for (const tableName of tableNames) {
      this.put(tableName)
    }
  }

  put(tableName: string): void {
    const key = tableName.toLowerCase()
    if (!this.names.has(key)) {
      this.names.set(key, tableName)
    }
  }

  contains(tableName: string): boolean {
    return this.names.has(tableName.toLowerCase())
  }

  /**
   * Original-case name registered for a table, if any
   */
  getOriginalName(tableName: string): string | undefined {
    return this.names.get(tableName.toLowerCase())
  }

  /**
   * Original-case table names in insertion order
   */
  getTableNames(): string[] {
    return Array.from(this.names.values())
  }

  get size(): number {
    return this.names.size
  }

  isEmpty(): boolean {
    return this.names.size === 0
  }
}

/**
 * Read-only view handed out by the encrypt rule
 */
export type ReadonlyTableNamesMapper = Omit<TableNamesMapper, 'put'>
