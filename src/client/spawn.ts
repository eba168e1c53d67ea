import { Worker } from 'node:worker_threads'
import type { LarderConfig } from '../types/config.js'
import { DatabaseWorkerClient } from './client.js'
import { DatabaseRequestError } from './errors.js'

export interface SpawnOptions {
  databaseFile?: string
  onDebug?: (message: string) => void
}

/** A running database worker and the client talking to it. */
export interface SpawnedWorker {
  readonly client: DatabaseWorkerClient
  terminate(): Promise<void>
}

/** Starts a database worker; the CLI accepts any launcher so hosts can run one in process. */
export type WorkerLauncher = (config: LarderConfig, options?: SpawnOptions) => SpawnedWorker

/**
 * Start the database worker on its own thread.
 *
 * The configuration travels as workerData. A crash or exit of the thread
 * closes the client: waiting requests and any sent later fail with CLOSED.
 */
export const spawnDatabaseWorker: WorkerLauncher = (config, options = {}) => {
  const worker = new Worker(new URL('../worker/main.js', import.meta.url), { workerData: config })

  const client = new DatabaseWorkerClient(worker, {
    databaseFile: options.databaseFile,
    requestTimeoutMs: config.client.requestTimeoutMs,
    onDebug: options.onDebug,
  })

  // A dead thread answers nothing, so the client is closed for good
  worker.on('error', (err: Error) => {
    client.close(new DatabaseRequestError('CLOSED', `Database worker crashed: ${err.message}`, { cause: err }))
  })
  worker.on('exit', (code: number) => {
    client.close(new DatabaseRequestError('CLOSED', `Database worker exited with code ${code}`))
  })

  return {
    client,
    async terminate() {
      client.close()
      await worker.terminate()
    },
  }
}
