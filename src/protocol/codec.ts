import { Value } from '@sinclair/typebox/value'
import type { EngineRow, EngineValue, Statement } from '../storage/interface.js'
import { WorkerError, errorMessage } from './errors.js'
import {
  REQUEST_KINDS,
  REQUEST_SCHEMAS,
  RequestSchema,
  WorkerMessageSchema,
  type Request,
  type RequestKind,
  type WireBindValue,
  type WireColumnValue,
  type WireRow,
  type WireStatement,
  type WorkerMessage,
} from './messages.js'

/** A column or parameter value as the host sees it. */
export type SqlValue = null | number | string | Uint8Array

/** A result row: column name to value, in column order. */
export type Row = Record<string, SqlValue>

/** Values a host may bind. Booleans bind as 1/0. */
export type BindValue = SqlValue | boolean

/** A statement as the host writes it. */
export type StatementInput = string | { sql: string; bind?: readonly BindValue[] }

const textDecoder = new TextDecoder('utf-8', { fatal: true })

function isRequestKind(kind: unknown): kind is RequestKind {
  return REQUEST_KINDS.some((known) => known === kind)
}

function payloadText(raw: unknown): string {
  if (typeof raw === 'string') return raw
  if (raw instanceof Uint8Array) return textDecoder.decode(raw)
  throw new Error(`expected JSON text, received ${raw === null ? 'null' : typeof raw}`)
}

/**
 * Decode one serialized request.
 *
 * @throws WorkerError REQUEST_DECODE when the payload is not JSON or does not
 *   match the schema of its kind, UNKNOWN_REQUEST_KIND when `type` names no
 *   known operation.
 */
export function decodeRequest(raw: unknown): Request {
  let parsed: unknown
  try {
    parsed = JSON.parse(payloadText(raw))
  } catch (err) {
    throw new WorkerError('REQUEST_DECODE', `Failed to parse request: ${errorMessage(err)}`, { cause: err })
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new WorkerError('REQUEST_DECODE', 'Failed to parse request: expected a JSON object')
  }

  const kind = 'type' in parsed ? parsed.type : undefined
  if (!isRequestKind(kind)) {
    throw new WorkerError('UNKNOWN_REQUEST_KIND', `Unknown request type: ${String(kind)}`)
  }

  if (!Value.Check(RequestSchema, parsed)) {
    const first = Value.Errors(REQUEST_SCHEMAS[kind], parsed).First()
    const detail = first ? `${first.path || '/'}: ${first.message}` : `invalid ${kind} request`
    throw new WorkerError('REQUEST_DECODE', `Failed to parse request: ${detail}`)
  }

  return parsed
}

/** Serialize a request or worker message for the channel. */
export function encodeMessage(message: Request | WorkerMessage): string {
  return JSON.stringify(message)
}

/**
 * Decode one message posted by the worker.
 *
 * @throws Error when the text is not JSON or not a known worker message
 */
export function decodeWorkerMessage(text: string): WorkerMessage {
  const parsed: unknown = JSON.parse(text)
  if (!Value.Check(WorkerMessageSchema, parsed)) {
    throw new Error('Worker message does not match the response protocol')
  }
  return parsed
}

// -- Engine side ------------------------------------------------------------

function fromWireBindValue(value: WireBindValue): EngineValue {
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value !== null && typeof value === 'object') return Buffer.from(value.$blob, 'base64')
  return value
}

/** Turn a wire statement into an engine statement. */
export function toStatement(statement: WireStatement): Statement {
  if (typeof statement === 'string') return { sql: statement, params: [] }
  return { sql: statement.sql, params: (statement.bind ?? []).map(fromWireBindValue) }
}

function toWireColumnValue(column: string, value: unknown): WireColumnValue {
  if (value === null || typeof value === 'number' || typeof value === 'string') return value
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString()
  }
  if (value instanceof Uint8Array) return { $blob: Buffer.from(value).toString('base64') }
  throw new WorkerError('STATEMENT_EXECUTION', `Column "${column}" has an unsupported value type: ${typeof value}`)
}

/** Encode an engine row for the channel, keeping column order. */
export function encodeRow(row: EngineRow): WireRow {
  const encoded: WireRow = {}
  for (const [column, value] of Object.entries(row)) {
    encoded[column] = toWireColumnValue(column, value)
  }
  return encoded
}

// -- Host side --------------------------------------------------------------

function toWireBindValue(value: BindValue): WireBindValue {
  if (value instanceof Uint8Array) return { $blob: Buffer.from(value).toString('base64') }
  return value
}

/** Turn a host statement into its wire form. */
export function toWireStatement(statement: StatementInput): WireStatement {
  if (typeof statement === 'string') return statement
  if (!statement.bind || statement.bind.length === 0) return { sql: statement.sql }
  return { sql: statement.sql, bind: statement.bind.map(toWireBindValue) }
}

/** Turn host bind values into their wire form. */
export function toWireBind(bind: readonly BindValue[]): WireBindValue[] {
  return bind.map(toWireBindValue)
}

/** Decode a wire row for the host; blobs become byte arrays. */
export function decodeRow(row: WireRow): Row {
  const decoded: Row = {}
  for (const [column, value] of Object.entries(row)) {
    decoded[column] =
      value !== null && typeof value === 'object' ? new Uint8Array(Buffer.from(value.$blob, 'base64')) : value
  }
  return decoded
}
