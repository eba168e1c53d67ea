export { DatabaseWorkerClient, DEFAULT_REQUEST_TIMEOUT_MS, type WorkerPort, type ClientOptions } from './client.js'
export { DatabaseRequestError, RowShapeError, type DatabaseRequestErrorCode } from './errors.js'
export { spawnDatabaseWorker, type SpawnedWorker, type SpawnOptions, type WorkerLauncher } from './spawn.js'
export {
  readString,
  readOptionalString,
  readNumber,
  readOptionalNumber,
  readInteger,
  readOptionalInteger,
} from './rows.js'
