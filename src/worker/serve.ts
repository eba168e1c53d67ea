import type { MessagePort } from 'node:worker_threads'
import { Value } from '@sinclair/typebox/value'
import type { DatabaseHandleManager } from '../storage/handle-manager.js'
import { LarderConfigSchema, type LarderConfig } from '../types/config.js'
import { createDispatcher, type FaultHandler, type ProtocolDispatcher } from './dispatcher.js'

export interface ServedWorker {
  dispatcher: ProtocolDispatcher
  handles: DatabaseHandleManager
}

function reportFault(err: Error): void {
  process.stderr.write(`[larder-worker] Failed to deliver response: ${err.message}\n`)
}

/**
 * Answer every message arriving on `port`. Responses and Debug traces are
 * posted back on the same port.
 */
export function serve(port: MessagePort, config: LarderConfig, onFault: FaultHandler = reportFault): ServedWorker {
  const served = createDispatcher(config, (payload) => port.postMessage(payload), onFault)

  port.on('message', (value: unknown) => {
    void served.dispatcher.enqueue(value)
  })

  return served
}

/**
 * Start serving from a worker thread's parent port.
 *
 * Returns undefined, after a line on stderr, when there is no parent port.
 *
 * @throws Error when workerData is not a valid configuration
 */
export function startWorker(port: MessagePort | null, workerData: unknown): ServedWorker | undefined {
  if (!port) {
    process.stderr.write('[larder-worker] No parent port - must run inside a worker thread\n')
    return undefined
  }
  if (!Value.Check(LarderConfigSchema, workerData)) {
    throw new Error('Database worker started without a valid configuration in workerData')
  }
  return serve(port, workerData)
}
