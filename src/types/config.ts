import { Type, type Static } from '@sinclair/typebox'

/** SQLite journal modes the worker may apply on open */
export const JournalModeSchema = Type.Union([
  Type.Literal('wal'),
  Type.Literal('delete'),
  Type.Literal('truncate'),
  Type.Literal('persist'),
  Type.Literal('memory'),
])

/** Larder configuration schema for larder.config.json */
export const LarderConfigSchema = Type.Object({
  storage: Type.Object({
    directory: Type.String({ minLength: 1, default: './data/local-db' }),
    defaultDatabaseFile: Type.String({ minLength: 1, default: 'products.sqlite3' }),
    journalMode: JournalModeSchema,
    busyTimeoutMs: Type.Number({ minimum: 0, default: 5000 }),
  }),
  worker: Type.Object({
    debug: Type.Boolean({ default: false }),
  }),
  client: Type.Object({
    requestTimeoutMs: Type.Number({ minimum: 0, default: 30000 }),
  }),
})

export type LarderConfig = Static<typeof LarderConfigSchema>
