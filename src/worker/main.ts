/**
 * Database worker thread entry.
 *
 * Receives the validated configuration as workerData and serves requests
 * from the parent port until the thread is terminated.
 */

import { parentPort, workerData } from 'node:worker_threads'
import { startWorker } from './serve.js'

if (!startWorker(parentPort, workerData)) {
  process.exitCode = 1
}
