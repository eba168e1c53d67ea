import { Type, type Static } from '@sinclair/typebox'

/** Binary value carried over the channel as base64 text. */
export const WireBlobSchema = Type.Object({ $blob: Type.String() }, { additionalProperties: false })
export type WireBlob = Static<typeof WireBlobSchema>

/** Value positionally bound to a `?` placeholder. Booleans bind as 1/0. */
export const WireBindValueSchema = Type.Union([
  Type.Null(),
  Type.Number(),
  Type.String(),
  Type.Boolean(),
  WireBlobSchema,
])
export type WireBindValue = Static<typeof WireBindValueSchema>

/** Value read back from a result column. */
export const WireColumnValueSchema = Type.Union([Type.Null(), Type.Number(), Type.String(), WireBlobSchema])
export type WireColumnValue = Static<typeof WireColumnValueSchema>

/** One statement of a batch: bare SQL text, or SQL with bind values. */
export const WireStatementSchema = Type.Union([
  Type.String(),
  Type.Object({
    sql: Type.String(),
    bind: Type.Optional(Type.Array(WireBindValueSchema)),
  }),
])
export type WireStatement = Static<typeof WireStatementSchema>

export const InitDbFileRequestSchema = Type.Object({
  type: Type.Literal('InitDbFile'),
  database_file: Type.Optional(Type.String()),
})

export const ExecRequestSchema = Type.Object({
  type: Type.Literal('Exec'),
  database_file: Type.Optional(Type.String()),
  statements: Type.Array(WireStatementSchema),
})

export const QueryRequestSchema = Type.Object({
  type: Type.Literal('Query'),
  database_file: Type.Optional(Type.String()),
  sql: Type.String(),
  bind: Type.Optional(Type.Array(WireBindValueSchema)),
})

/** Request schema: discriminated union of every operation the worker accepts. */
export const RequestSchema = Type.Union([InitDbFileRequestSchema, ExecRequestSchema, QueryRequestSchema])
export type Request = Static<typeof RequestSchema>
export type RequestKind = Request['type']

export const REQUEST_KINDS: readonly RequestKind[] = ['InitDbFile', 'Exec', 'Query']

export const REQUEST_SCHEMAS = {
  InitDbFile: InitDbFileRequestSchema,
  Exec: ExecRequestSchema,
  Query: QueryRequestSchema,
} as const

export const WireRowSchema = Type.Record(Type.String(), WireColumnValueSchema)
export type WireRow = Static<typeof WireRowSchema>

/** Response schema: exactly one of these is sent per request. */
export const ResponseSchema = Type.Union([
  Type.Object({ type: Type.Literal('Ok') }),
  Type.Object({ type: Type.Literal('Rows'), rows: Type.Array(WireRowSchema) }),
  Type.Object({ type: Type.Literal('Err'), message: Type.String() }),
])
export type Response = Static<typeof ResponseSchema>

/** Out-of-band diagnostic; never the only reply to a request. */
export const DebugMessageSchema = Type.Object({
  type: Type.Literal('Debug'),
  message: Type.String(),
})
export type DebugMessage = Static<typeof DebugMessageSchema>

/** Anything the worker may post back to its host. */
export const WorkerMessageSchema = Type.Union([ResponseSchema, DebugMessageSchema])
export type WorkerMessage = Static<typeof WorkerMessageSchema>
