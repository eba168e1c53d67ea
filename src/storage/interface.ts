/** A value the engine binds or returns. */
export type EngineValue = null | number | bigint | string | Buffer

/** One SQL text with its positional parameters. */
export interface Statement {
  readonly sql: string
  readonly params: readonly EngineValue[]
}

/** A result row exactly as the engine produced it. */
export type EngineRow = Record<string, unknown>

/**
 * The single open connection to the worker's database file.
 *
 * Only the DatabaseHandleManager creates one; everything else receives it
 * from `ensureOpen()`.
 */
export interface DatabaseHandle {
  /** Logical file name inside the storage directory. */
  readonly fileName: string

  /** Absolute path of the database file. */
  readonly path: string

  readonly open: boolean

  /** Execute a statement for its effects, discarding any rows. */
  execute(statement: Statement): void

  /** Execute a statement that returns rows and materialize all of them. */
  all(statement: Statement): EngineRow[]

  /** Run `fn` inside BEGIN/COMMIT; any throw rolls back and is rethrown. */
  transaction<T>(fn: () => T): T

  close(): void
}

/** Receives diagnostic trace lines. */
export type TraceSink = (message: string) => void
