import type { LarderConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: LarderConfig = {
  storage: {
    directory: './data/local-db',
    defaultDatabaseFile: 'products.sqlite3',
    journalMode: 'wal',
    busyTimeoutMs: 5000,
  },
  worker: {
    debug: false,
  },
  client: {
    requestTimeoutMs: 30000,
  },
}
