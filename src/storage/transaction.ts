import { WorkerError, errorMessage } from '../protocol/errors.js'
import type { DatabaseHandle, EngineRow, Statement, TraceSink } from './interface.js'

/**
 * Execute a batch inside one transaction.
 *
 * Statements run in the given order. The first failure rolls back the whole
 * batch and is rethrown as STATEMENT_EXECUTION with the engine's message and
 * the statement's index; nothing from the batch remains visible.
 */
export function runBatch(
  handle: DatabaseHandle,
  statements: readonly Statement[],
  trace: TraceSink = () => {},
): void {
  handle.transaction(() => {
    statements.forEach((statement, index) => {
      trace(`Exec stmt: ${statement.sql}`)
      try {
        handle.execute(statement)
      } catch (err) {
        throw new WorkerError('STATEMENT_EXECUTION', errorMessage(err), { cause: err, statementIndex: index })
      }
    })
  })
}

/** Run a single read outside any transaction and materialize every row. */
export function runQuery(handle: DatabaseHandle, statement: Statement): EngineRow[] {
  try {
    return handle.all(statement)
  } catch (err) {
    if (err instanceof WorkerError) throw err
    throw new WorkerError('STATEMENT_EXECUTION', errorMessage(err), { cause: err })
  }
}
