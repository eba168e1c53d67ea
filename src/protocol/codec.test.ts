import { describe, it, expect } from 'vitest'
import {
  decodeRequest,
  decodeRow,
  decodeWorkerMessage,
  encodeMessage,
  encodeRow,
  toStatement,
  toWireStatement,
} from './codec.js'
import { WorkerError } from './errors.js'

function decodeError(raw: unknown): WorkerError {
  try {
    decodeRequest(raw)
  } catch (err) {
    if (err instanceof WorkerError) return err
    throw err
  }
  throw new Error('expected decodeRequest to throw')
}

describe('decodeRequest', () => {
  describe('valid requests', () => {
    it('should decode InitDbFile without a database file', () => {
      expect(decodeRequest('{"type":"InitDbFile"}')).toEqual({ type: 'InitDbFile' })
    })

    it('should decode Exec with bare and bound statements', () => {
      const text = JSON.stringify({
        type: 'Exec',
        database_file: 'meals.sqlite3',
        statements: ['CREATE TABLE t(id INTEGER)', { sql: 'INSERT INTO t VALUES (?)', bind: [1] }],
      })
      expect(decodeRequest(text)).toEqual({
        type: 'Exec',
        database_file: 'meals.sqlite3',
        statements: ['CREATE TABLE t(id INTEGER)', { sql: 'INSERT INTO t VALUES (?)', bind: [1] }],
      })
    })

    it('should decode a UTF-8 encoded payload', () => {
      const bytes = new TextEncoder().encode('{"type":"Query","sql":"SELECT 1"}')
      expect(decodeRequest(bytes)).toEqual({ type: 'Query', sql: 'SELECT 1' })
    })
  })

  describe('unknown kinds', () => {
    it('should name the unrecognized type', () => {
      const err = decodeError('{"type":"Bogus"}')
      expect(err.code).toBe('UNKNOWN_REQUEST_KIND')
      expect(err.message).toBe('Unknown request type: Bogus')
    })

    it('should report a missing type as undefined', () => {
      const err = decodeError('{}')
      expect(err.code).toBe('UNKNOWN_REQUEST_KIND')
      expect(err.message).toBe('Unknown request type: undefined')
    })
  })

  describe('decode failures', () => {
    it('should reject text that is not JSON', () => {
      const err = decodeError('not json')
      expect(err.code).toBe('REQUEST_DECODE')
      expect(err.message).toMatch(/^Failed to parse request: /)
    })

    it('should reject JSON that is not an object', () => {
      expect(decodeError('[1,2]').message).toBe('Failed to parse request: expected a JSON object')
    })

    it('should reject payloads that are not text', () => {
      expect(decodeError(42).message).toBe('Failed to parse request: expected JSON text, received number')
    })

    it('should point at a missing required field', () => {
      const err = decodeError('{"type":"Exec"}')
      expect(err.code).toBe('REQUEST_DECODE')
      expect(err.message).toMatch(/^Failed to parse request: \/statements: /)
    })

    it('should reject bind values that are neither primitives nor blobs', () => {
      const err = decodeError('{"type":"Query","sql":"SELECT ?","bind":[{"x":1}]}')
      expect(err.code).toBe('REQUEST_DECODE')
      expect(err.message).toMatch(/^Failed to parse request: \/bind\/0/)
    })
  })
})

describe('toStatement', () => {
  it('should give bare SQL no parameters', () => {
    expect(toStatement('SELECT 1')).toEqual({ sql: 'SELECT 1', params: [] })
  })

  it('should bind booleans as integers and decode blobs', () => {
    expect(
      toStatement({ sql: 'INSERT INTO t VALUES (?, ?, ?, ?)', bind: [true, false, null, { $blob: 'AQID' }] }),
    ).toEqual({
      sql: 'INSERT INTO t VALUES (?, ?, ?, ?)',
      params: [1, 0, null, Buffer.from([1, 2, 3])],
    })
  })
})

describe('encodeRow', () => {
  it('should keep primitives and encode blobs as base64', () => {
    expect(encodeRow({ id: 1, name: 'a', data: Buffer.from([1, 2, 3]), note: null })).toEqual({
      id: 1,
      name: 'a',
      data: { $blob: 'AQID' },
      note: null,
    })
  })

  it('should keep column order', () => {
    expect(Object.keys(encodeRow({ b: 1, a: 2, c: 3 }))).toEqual(['b', 'a', 'c'])
  })

  it('should turn big integers into numbers only when exact', () => {
    expect(encodeRow({ small: 5n, big: 9007199254740993n })).toEqual({ small: 5, big: '9007199254740993' })
  })

  it('should reject values the protocol cannot carry', () => {
    expect(() => encodeRow({ when: new Date(0) })).toThrow('Column "when" has an unsupported value type: object')
  })
})

describe('host side', () => {
  it('should encode blob bind values', () => {
    expect(toWireStatement({ sql: 'INSERT INTO t VALUES (?)', bind: [new Uint8Array([255])] })).toEqual({
      sql: 'INSERT INTO t VALUES (?)',
      bind: [{ $blob: '/w==' }],
    })
  })

  it('should drop an empty bind list', () => {
    expect(toWireStatement({ sql: 'DELETE FROM t', bind: [] })).toEqual({ sql: 'DELETE FROM t' })
  })

  it('should decode blob columns into byte arrays', () => {
    expect(decodeRow({ data: { $blob: 'AQID' }, n: 2 })).toEqual({ data: new Uint8Array([1, 2, 3]), n: 2 })
  })

  it('should round-trip a Debug message', () => {
    const text = encodeMessage({ type: 'Debug', message: 'Exec begin' })
    expect(decodeWorkerMessage(text)).toEqual({ type: 'Debug', message: 'Exec begin' })
  })

  it('should reject worker messages outside the protocol', () => {
    expect(() => decodeWorkerMessage('{"type":"Rows"}')).toThrow(
      'Worker message does not match the response protocol',
    )
  })
})
