import type { Row } from '../protocol/codec.js'
import { RowShapeError } from './errors.js'

/**
 * Typed readers for dynamic rows. Each throws RowShapeError when the column is
 * missing (required readers) or holds a value of another type.
 */

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) return `blob(${value.byteLength})`
  return JSON.stringify(value)
}

export function readOptionalString(row: Row, column: string): string | undefined {
  const value = row[column]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw new RowShapeError(column, `Unexpected type for '${column}': ${describeValue(value)}`)
}

export function readString(row: Row, column: string): string {
  const value = readOptionalString(row, column)
  if (value === undefined) throw new RowShapeError(column, `Missing string column '${column}'`)
  return value
}

export function readOptionalNumber(row: Row, column: string): number | undefined {
  const value = row[column]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'number') return value
  throw new RowShapeError(column, `Unexpected type for '${column}': ${describeValue(value)}`)
}

export function readNumber(row: Row, column: string): number {
  const value = readOptionalNumber(row, column)
  if (value === undefined) throw new RowShapeError(column, `Missing number column '${column}'`)
  return value
}

export function readOptionalInteger(row: Row, column: string): number | undefined {
  const value = readOptionalNumber(row, column)
  if (value !== undefined && !Number.isInteger(value)) {
    throw new RowShapeError(column, `Invalid integer for '${column}': ${value}`)
  }
  return value
}

export function readInteger(row: Row, column: string): number {
  const value = readOptionalInteger(row, column)
  if (value === undefined) throw new RowShapeError(column, `Missing integer column '${column}'`)
  return value
}
