import { decodeRequest, encodeMessage, encodeRow, toStatement } from '../protocol/codec.js'
import { errorMessage } from '../protocol/errors.js'
import type { Request, Response } from '../protocol/messages.js'
import { DatabaseHandleManager } from '../storage/handle-manager.js'
import type { TraceSink } from '../storage/interface.js'
import { runBatch, runQuery } from '../storage/transaction.js'
import type { LarderConfig } from '../types/config.js'

/** Posts one serialized message across the channel. */
export type MessageSink = (payload: string) => void

/** Called when a response could not be delivered. */
export type FaultHandler = (error: Error) => void

export interface DispatcherOptions {
  /** Emits Debug traces; a no-op unless tracing is enabled. */
  trace: TraceSink
  onFault: FaultHandler
}

/**
 * Build a trace sink that posts `{type: "Debug"}` messages when enabled.
 */
export function createTraceSink(send: MessageSink, enabled: boolean): TraceSink {
  if (!enabled) return () => {}
  return (message) => send(encodeMessage({ type: 'Debug', message }))
}

/**
 * Decodes requests, routes them to the handle manager and transaction
 * executor, and sends exactly one response per request.
 *
 * Requests are queued and handled one at a time in arrival order, so
 * responses follow request order and no two batches ever share the handle.
 */
export class ProtocolDispatcher {
  private queue: Promise<void> = Promise.resolve()

  constructor(
    private readonly handles: DatabaseHandleManager,
    private readonly send: MessageSink,
    private readonly options: DispatcherOptions,
  ) {}

  /**
   * Queue one raw message. The returned promise settles once its response has
   * been sent; it never rejects.
   */
  enqueue(raw: unknown): Promise<void> {
    this.queue = this.queue
      .then(() => this.process(raw))
      .catch((err: unknown) => {
        this.options.onFault(err instanceof Error ? err : new Error(String(err)))
      })
    return this.queue
  }

  /** Resolves once every queued request has been answered. */
  idle(): Promise<void> {
    return this.queue
  }

  /** Handle one message and produce its response without sending it. */
  async handle(raw: unknown): Promise<Response> {
    const trace = this.options.trace
    trace('handleMessage: received event')

    let request: Request
    try {
      request = decodeRequest(raw)
    } catch (err) {
      return { type: 'Err', message: errorMessage(err) }
    }

    try {
      return await this.route(request)
    } catch (err) {
      trace(`Error: ${errorMessage(err)}`)
      return { type: 'Err', message: errorMessage(err) }
    }
  }

  private async process(raw: unknown): Promise<void> {
    const response = await this.handle(raw)
    this.send(encodeMessage(response))
  }

  private async route(request: Request): Promise<Response> {
    const trace = this.options.trace

    switch (request.type) {
      case 'InitDbFile': {
        trace('InitDbFile')
        await this.handles.ensureOpen(request.database_file)
        return { type: 'Ok' }
      }
      case 'Exec': {
        trace('Exec begin')
        const handle = await this.handles.ensureOpen(request.database_file)
        runBatch(handle, request.statements.map(toStatement), trace)
        trace('Exec done')
        return { type: 'Ok' }
      }
      case 'Query': {
        trace('Query begin')
        const handle = await this.handles.ensureOpen(request.database_file)
        const rows = runQuery(handle, toStatement({ sql: request.sql, bind: request.bind }))
        trace('Query done')
        return { type: 'Rows', rows: rows.map(encodeRow) }
      }
    }
  }
}

/**
 * Wire a handle manager and dispatcher from configuration.
 */
export function createDispatcher(
  config: LarderConfig,
  send: MessageSink,
  onFault: FaultHandler,
): { dispatcher: ProtocolDispatcher; handles: DatabaseHandleManager } {
  const trace = createTraceSink(send, config.worker.debug)
  const handles = new DatabaseHandleManager(config.storage, trace)
  const dispatcher = new ProtocolDispatcher(handles, send, { trace, onFault })
  return { dispatcher, handles }
}
