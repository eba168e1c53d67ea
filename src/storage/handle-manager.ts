import { constants } from 'node:fs'
import { access, mkdir } from 'node:fs/promises'
import { basename, join, resolve } from 'node:path'
import { WorkerError, errorMessage } from '../protocol/errors.js'
import type { DatabaseHandle, TraceSink } from './interface.js'
import { SqliteHandle, type SqliteHandleOptions } from './sqlite.js'

export interface StorageOptions extends SqliteHandleOptions {
  /** Directory holding the database file; created on first open. */
  directory: string
  /** File name used when a request names none. */
  defaultDatabaseFile: string
}

export type HandleState = 'uninitialized' | 'ready'

/** Opens the engine connection once the storage directory is known to be usable. */
export type HandleFactory = (path: string, fileName: string, options: SqliteHandleOptions) => DatabaseHandle

const openSqliteHandle: HandleFactory = (path, fileName, options) => new SqliteHandle(path, fileName, options)

function isPlainFileName(fileName: string): boolean {
  return fileName !== '.' && fileName !== '..' && basename(fileName) === fileName && !fileName.includes('\\')
}

/**
 * Owner of the worker's only database handle.
 *
 * The first `ensureOpen()` opens the file; every later call returns the cached
 * handle without looking at the file name it was given, so a worker serves
 * exactly one logical database for its whole life. Concurrent first calls
 * share one open. A failed open leaves the manager uninitialized and the next
 * call tries again.
 */
export class DatabaseHandleManager {
  private handle: DatabaseHandle | undefined
  private opening: Promise<DatabaseHandle> | undefined

  constructor(
    private readonly options: StorageOptions,
    private readonly trace: TraceSink = () => {},
    private readonly openHandle: HandleFactory = openSqliteHandle,
  ) {}

  get state(): HandleState {
    return this.handle ? 'ready' : 'uninitialized'
  }

  /** The open handle, if any. */
  get current(): DatabaseHandle | undefined {
    return this.handle
  }

  ensureOpen(fileName?: string): Promise<DatabaseHandle> {
    if (this.handle) return Promise.resolve(this.handle)

    if (!this.opening) {
      this.opening = this.open(fileName || this.options.defaultDatabaseFile).finally(() => {
        this.opening = undefined
      })
    }
    return this.opening
  }

  /** Close the handle. Hosts that own the manager in process call this on teardown. */
  close(): void {
    const handle = this.handle
    this.handle = undefined
    if (handle?.open) handle.close()
  }

  private async open(fileName: string): Promise<DatabaseHandle> {
    if (!isPlainFileName(fileName)) {
      throw new WorkerError(
        'INVALID_DATABASE_FILE',
        `Invalid database file name "${fileName}": expected a file name inside the storage directory`,
      )
    }

    const directory = resolve(this.options.directory)
    this.trace(`ensureDb: opening ${fileName} in ${directory}`)

    try {
      await mkdir(directory, { recursive: true })
      await access(directory, constants.R_OK | constants.W_OK)
    } catch (err) {
      this.trace('ensureDb: storage unavailable')
      throw new WorkerError(
        'STORAGE_UNAVAILABLE',
        `Persistent storage is not available at ${directory}: ${errorMessage(err)}`,
        { cause: err },
      )
    }

    let handle: DatabaseHandle
    try {
      handle = this.openHandle(join(directory, fileName), fileName, {
        journalMode: this.options.journalMode,
        busyTimeoutMs: this.options.busyTimeoutMs,
      })
    } catch (err) {
      this.trace('ensureDb: open failed')
      throw new WorkerError('STORAGE_UNAVAILABLE', `Failed to open database ${fileName}: ${errorMessage(err)}`, {
        cause: err,
      })
    }

    this.handle = handle
    this.trace('ensureDb: DB ready')
    return handle
  }
}
