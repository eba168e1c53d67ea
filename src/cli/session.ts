import type { DatabaseWorkerClient, WorkerLauncher } from '../client/index.js'
import { loadConfig, ConfigError } from '../config/index.js'
import { errorMessage } from '../protocol/errors.js'
import type { LarderConfig } from '../types/config.js'
import { output } from './output.js'

/** Options shared by every command that talks to the worker. */
export interface ConnectionOptions {
  config?: string
  database?: string
  debug?: boolean
}

/**
 * Load configuration, start a worker, run `fn` against its client, and stop
 * the worker again. Failures print an error and exit with status 1.
 */
export async function withDatabaseWorker(
  options: ConnectionOptions,
  launch: WorkerLauncher,
  fn: (client: DatabaseWorkerClient, config: LarderConfig) => Promise<void>,
): Promise<void> {
  let config: LarderConfig
  try {
    config = loadConfig(options.config)
  } catch (err) {
    if (err instanceof ConfigError) {
      output.error(err.message)
      process.exit(1)
      return
    }
    throw err
  }

  if (options.debug) {
    config = { ...config, worker: { ...config.worker, debug: true } }
  }

  const worker = launch(config, {
    databaseFile: options.database,
    onDebug: config.worker.debug ? (message) => output.debug(message) : undefined,
  })

  let failure: string | undefined
  try {
    await fn(worker.client, config)
  } catch (err) {
    failure = errorMessage(err)
  } finally {
    await worker.terminate()
  }

  if (failure !== undefined) {
    output.error(failure)
    process.exit(1)
  }
}
