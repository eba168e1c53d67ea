/**
 * End-to-end: typed client -> MessageChannel -> dispatcher -> SQLite file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { DatabaseRequestError, readInteger, readString } from '../src/client/index.js'
import { createTempDir, createTestConfig, launchInProcessWorker, type InProcessWorker } from './helpers/worker-harness.js'

describe('database worker protocol', () => {
  let dir: string
  let cleanup: () => void
  let worker: InProcessWorker
  let traces: string[]

  beforeEach(() => {
    ;({ dir, cleanup } = createTempDir('larder-e2e-'))
    traces = []
  })

  afterEach(async () => {
    await worker.terminate()
    cleanup()
  })

  function start(options: { debug?: boolean; databaseFile?: string } = {}): InProcessWorker {
    worker = launchInProcessWorker(createTestConfig(dir, { debug: options.debug }), {
      databaseFile: options.databaseFile,
      onDebug: (message) => traces.push(message),
    })
    return worker
  }

  it('should create the database file on InitDbFile and keep data across repeats', async () => {
    const { client } = start()

    await client.initialize()
    expect(existsSync(join(dir, 'products.sqlite3'))).toBe(true)

    await client.exec(['CREATE TABLE recipes(id INTEGER PRIMARY KEY, title TEXT NOT NULL)'])
    await client.exec([{ sql: 'INSERT INTO recipes(id, title) VALUES (?, ?)', bind: [1, 'Lentil soup'] }])
    await client.initialize()

    const rows = await client.query('SELECT id, title FROM recipes')
    expect(rows.map((row) => [readInteger(row, 'id'), readString(row, 'title')])).toEqual([[1, 'Lentil soup']])
  })

  it('should answer concurrent requests in the order they were sent', async () => {
    const { client } = start()
    await client.exec(['CREATE TABLE pantry(item TEXT PRIMARY KEY, qty INTEGER)'])

    const [inserted, afterInsert, cleared, afterClear] = await Promise.all([
      client.exec([{ sql: 'INSERT INTO pantry VALUES (?, ?)', bind: ['rice', 2] }]),
      client.query('SELECT COUNT(*) AS n FROM pantry'),
      client.exec(['DELETE FROM pantry']),
      client.query('SELECT COUNT(*) AS n FROM pantry'),
    ])

    expect(inserted).toBeUndefined()
    expect(afterInsert).toEqual([{ n: 1 }])
    expect(cleared).toBeUndefined()
    expect(afterClear).toEqual([{ n: 0 }])
  })

  it('should roll back a whole batch when one statement fails', async () => {
    const { client } = start()
    await client.exec(['CREATE TABLE t(id INTEGER PRIMARY KEY, name TEXT)'])

    await expect(
      client.exec([
        { sql: 'INSERT INTO t(id, name) VALUES (?, ?)', bind: [1, 'a'] },
        { sql: 'INSERT INTO t(id, name) VALUES (?, ?)', bind: [2, 'b'] },
        { sql: 'INSERT INTO t(id, name) VALUES (?, ?)', bind: [1, 'c'] },
      ]),
    ).rejects.toMatchObject({ code: 'REMOTE', message: 'UNIQUE constraint failed: t.id' })

    expect(await client.query('SELECT COUNT(*) AS n FROM t')).toEqual([{ n: 0 }])
  })

  it('should enforce foreign keys', async () => {
    const { client } = start()
    await client.exec([
      'CREATE TABLE meals(id INTEGER PRIMARY KEY)',
      'CREATE TABLE ingredients(meal_id INTEGER NOT NULL REFERENCES meals(id), name TEXT)',
    ])

    await expect(client.exec(["INSERT INTO ingredients VALUES (9, 'salt')"])).rejects.toThrow(
      'FOREIGN KEY constraint failed',
    )
  })

  it('should carry booleans, nulls and blobs across the boundary', async () => {
    const { client } = start()
    await client.exec([
      'CREATE TABLE items(done INTEGER, note TEXT, photo BLOB)',
      { sql: 'INSERT INTO items VALUES (?, ?, ?)', bind: [true, null, new Uint8Array([0, 255, 16])] },
    ])

    expect(await client.query('SELECT done, note, photo FROM items')).toEqual([
      { done: 1, note: null, photo: new Uint8Array([0, 255, 16]) },
    ])
  })

  it('should return integers past 2^53 as exact decimal strings', async () => {
    const { client } = start()
    await client.exec(['CREATE TABLE big(v INTEGER)', 'INSERT INTO big VALUES (9007199254740993), (42)'])

    expect(await client.query('SELECT v, CAST(v AS TEXT) AS s FROM big ORDER BY v')).toEqual([
      { v: 42, s: '42' },
      { v: '9007199254740993', s: '9007199254740993' },
    ])
  })

  it('should keep serving after an unknown request kind', async () => {
    const { client, dispatcher } = start()

    await expect(dispatcher.handle('{"type":"Bogus"}')).resolves.toEqual({
      type: 'Err',
      message: 'Unknown request type: Bogus',
    })
    expect(await client.query('SELECT 1 AS one')).toEqual([{ one: 1 }])
  })

  it('should surface storage failures as remote errors', async () => {
    const blocker = join(dir, 'blocker')
    writeFileSync(blocker, '')
    worker = launchInProcessWorker(createTestConfig(join(blocker, 'nested')))

    const failure = await worker.client.initialize().catch((err: unknown) => err)
    expect(failure).toBeInstanceOf(DatabaseRequestError)
    expect(failure).toMatchObject({
      code: 'REMOTE',
      message: expect.stringMatching(/^Persistent storage is not available at /),
    })
  })

  it('should stay on the first database for the worker lifetime', async () => {
    const { client } = start({ databaseFile: 'meals.sqlite3' })
    await client.exec(['CREATE TABLE t(id INTEGER)'])

    await expect(client.send({ type: 'InitDbFile', database_file: 'other.sqlite3' })).resolves.toEqual({ type: 'Ok' })
    expect(existsSync(join(dir, 'meals.sqlite3'))).toBe(true)
    expect(existsSync(join(dir, 'other.sqlite3'))).toBe(false)
  })

  it('should deliver Debug traces to onDebug without disturbing responses', async () => {
    const { client } = start({ debug: true })

    expect(await client.query('SELECT 1 AS one')).toEqual([{ one: 1 }])
    expect(traces).toEqual([
      'handleMessage: received event',
      'Query begin',
      `ensureDb: opening products.sqlite3 in ${dir}`,
      'ensureDb: DB ready',
      'Query done',
    ])
  })

  it('should reject requests after terminate', async () => {
    const { client } = start()
    await worker.terminate()

    await expect(client.initialize()).rejects.toMatchObject({ code: 'CLOSED' })
  })
})
