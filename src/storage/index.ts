export type { DatabaseHandle, Statement, EngineRow, EngineValue, TraceSink } from './interface.js'
export { SqliteHandle, type JournalMode, type SqliteHandleOptions } from './sqlite.js'
export {
  DatabaseHandleManager,
  type StorageOptions,
  type HandleState,
  type HandleFactory,
} from './handle-manager.js'
export { runBatch, runQuery } from './transaction.js'
