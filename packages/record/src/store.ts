import initSqlJs, { type Database, type SqlJsStatic, type SqlValue, type Statement } from 'sql.js'
import {
  DummyDriver,
  Kysely,
  SqliteAdapter,
  SqliteIntrospector,
  SqliteQueryCompiler,
  sql,
  type CompiledQuery,
  type RawBuilder
} from 'kysely'
import { createEnvLogger, parseSqliteError, type EnsembleLogger } from '@ensemble/core'

export type SqliteValue = SqlValue

export type Row = Record<string, unknown>

export interface RecordStoreOptions {
  /** Primary key column shared by every table. Default: `id` */
  primaryKey?: string
  logger?: EnsembleLogger
}

let sqlJs: Promise<SqlJsStatic> | undefined

/**
 * Open an in-memory SQLite database, optionally from a serialized image.
 *
 * The WebAssembly build is loaded once per process; everything after that is
 * synchronous.
 */
export async function openDatabase(data?: Uint8Array): Promise<Database> {
  // `.default` is the loader under both CommonJS and ESM interop
  sqlJs ??= initSqlJs.default()
  const SQL = await sqlJs
  return new SQL.Database(data)
}

/**
 * Convert a model value into something the SQLite driver binds.
 */
export function toSqliteValue(value: unknown): SqliteValue {
  if (value === undefined || value === null) return null
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'bigint') return value.toString()
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'string' || typeof value === 'number' || value instanceof Uint8Array) {
    return value
  }
  return JSON.stringify(value)
}

/**
 * Synchronous persistence for table records.
 *
 * Statements are built with kysely's `sql` templates and compiled by a
 * Kysely instance that never connects (dummy driver, SQLite compiler); the
 * compiled SQL is then run on a sql.js database, which is synchronous.
 *
 * @example
 * ```typescript
 * const store = new RecordStore(await openDatabase())
 * const id = store.insert('people', { name: 'Ada' })
 * store.find('people', id) // { id: 1, name: 'Ada' }
 * ```
 */
export class RecordStore {
  readonly primaryKey: string
  readonly logger: EnsembleLogger
  private readonly compiler: Kysely<Record<string, Row>>

  constructor(
    readonly database: Database,
    options: RecordStoreOptions = {}
  ) {
    this.primaryKey = options.primaryKey ?? 'id'
    this.logger = options.logger ?? createEnvLogger('record')
    this.compiler = new Kysely<Record<string, Row>>({
      dialect: {
        createAdapter: () => new SqliteAdapter(),
        createDriver: () => new DummyDriver(),
        createIntrospector: db => new SqliteIntrospector(db),
        createQueryCompiler: () => new SqliteQueryCompiler()
      }
    })
  }

  /**
   * Insert a row and return its rowid.
   */
  insert(table: string, values: Row): number {
    const columns = Object.keys(values)
    const query =
      columns.length === 0
        ? sql`insert into ${sql.table(table)} default values`
        : sql`insert into ${sql.table(table)} (${sql.join(columns.map(column => sql.ref(column)))}) values (${sql.join(
            columns.map(column => values[column])
          )})`

    this.run(query, statement => statement.step())
    const row = this.selectOne(sql`select last_insert_rowid() as ${sql.ref('id')}`)
    return Number(row?.['id'])
  }

  /**
   * Update the row with primary key `id`; returns the number of changed rows.
   */
  update(table: string, id: number, values: Row): number {
    const columns = Object.keys(values)
    if (columns.length === 0) {
      return 0
    }
    const assignments = columns.map(column => sql`${sql.ref(column)} = ${values[column]}`)
    const query = sql`update ${sql.table(table)} set ${sql.join(assignments)} where ${sql.ref(this.primaryKey)} = ${id}`

    this.run(query, statement => statement.step())
    return this.database.getRowsModified()
  }

  find(table: string, id: number): Row | undefined {
    return this.selectOne(
      sql`select * from ${sql.table(table)} where ${sql.ref(this.primaryKey)} = ${id}`
    )
  }

  count(table: string): number {
    const row = this.selectOne(sql`select count(*) as ${sql.ref('count')} from ${sql.table(table)}`)
    const count = row?.['count']
    return typeof count === 'number' ? count : 0
  }

  private selectOne(query: RawBuilder<unknown>): Row | undefined {
    return this.run(query, statement => (statement.step() ? statement.getAsObject() : undefined))
  }

  /**
   * Compile `query`, bind its parameters and hand the prepared statement to
   * `execute`. The statement is freed afterwards. Driver errors are rethrown
   * as DatabaseError subclasses.
   */
  private run<T>(query: RawBuilder<unknown>, execute: (statement: Statement) => T): T {
    const compiled: CompiledQuery = query.compile(this.compiler)
    this.logger.trace(compiled.sql, compiled.parameters)

    let statement: Statement | undefined
    try {
      statement = this.database.prepare(compiled.sql)
      statement.bind(compiled.parameters.map(toSqliteValue))
      return execute(statement)
    } catch (error) {
      throw parseSqliteError(error)
    } finally {
      statement?.free()
    }
  }
}
