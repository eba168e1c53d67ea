import Database from 'better-sqlite3'
import { WorkerError } from '../protocol/errors.js'
import type { DatabaseHandle, EngineRow, EngineValue, Statement } from './interface.js'

export type JournalMode = 'wal' | 'delete' | 'truncate' | 'persist' | 'memory'

export interface SqliteHandleOptions {
  journalMode: JournalMode
  busyTimeoutMs: number
}

/**
 * better-sqlite3 implementation of DatabaseHandle.
 *
 * Opens (or creates) the file, applies the journal mode and turns on foreign
 * key enforcement before anything else runs on the connection. Integers are
 * read as bigint so values past 2^53 keep every digit.
 */
export class SqliteHandle implements DatabaseHandle {
  private readonly db: Database.Database
  /** Journal mode reported by the engine after opening. */
  readonly journalMode: string

  constructor(
    readonly path: string,
    readonly fileName: string,
    options: SqliteHandleOptions,
  ) {
    this.db = new Database(path, { timeout: options.busyTimeoutMs })
    try {
      const mode: unknown = this.db.pragma(`journal_mode = ${options.journalMode.toUpperCase()}`, { simple: true })
      this.journalMode = typeof mode === 'string' ? mode : options.journalMode
      this.db.pragma('foreign_keys = ON')
      this.db.defaultSafeIntegers(true)
    } catch (err) {
      this.db.close()
      throw err
    }
  }

  get open(): boolean {
    return this.db.open
  }

  execute(statement: Statement): void {
    // Without parameters the text may hold several statements
    if (statement.params.length === 0) {
      this.db.exec(statement.sql)
      return
    }
    const prepared = this.db.prepare<EngineValue[]>(statement.sql)
    if (prepared.reader) {
      prepared.all(...statement.params)
    } else {
      prepared.run(...statement.params)
    }
  }

  all(statement: Statement): EngineRow[] {
    const prepared = this.db.prepare<EngineValue[], EngineRow>(statement.sql)
    // RETURNING makes a write a reader too
    if (!prepared.reader || !prepared.readonly) {
      throw new WorkerError(
        'STATEMENT_EXECUTION',
        'Query only accepts statements that return rows; use Exec for writes',
      )
    }
    return prepared.all(...statement.params)
  }

  transaction<T>(fn: () => T): T {
    const wrapped = this.db.transaction(fn)
    return wrapped()
  }

  close(): void {
    this.db.close()
  }
}
