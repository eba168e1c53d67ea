import {
  decodeRow,
  decodeWorkerMessage,
  encodeMessage,
  toWireBind,
  toWireStatement,
  type BindValue,
  type Row,
  type StatementInput,
} from '../protocol/codec.js'
import { errorMessage } from '../protocol/errors.js'
import type { Request, RequestKind, Response, WorkerMessage } from '../protocol/messages.js'
import { DatabaseRequestError } from './errors.js'

/**
 * The host end of the channel. Satisfied by a worker_threads Worker and by a
 * MessagePort.
 */
export interface WorkerPort {
  postMessage(value: string): void
  on(event: 'message', listener: (value: unknown) => void): unknown
  off(event: 'message', listener: (value: unknown) => void): unknown
}

export interface ClientOptions {
  /** Sent as `database_file`; the worker's default file when omitted. */
  databaseFile?: string
  /** Per-request timeout; 0 disables it. */
  requestTimeoutMs?: number
  /** Receives worker Debug traces. */
  onDebug?: (message: string) => void
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000

interface PendingRequest {
  readonly kind: RequestKind
  readonly resolve: (response: Response) => void
  readonly reject: (error: Error) => void
  timer?: ReturnType<typeof setTimeout>
  /** Timed out: the slot stays queued so its late response is consumed. */
  abandoned: boolean
}

/**
 * Sends requests to the database worker and matches replies to them.
 *
 * The worker answers strictly in request order, so replies are matched
 * first-in first-out without correlation IDs. Debug traces are handed to
 * `onDebug` and never settle a request.
 */
export class DatabaseWorkerClient {
  private readonly pending: PendingRequest[] = []
  private closedReason?: DatabaseRequestError
  private readonly listener = (value: unknown): void => this.receive(value)

  constructor(
    private readonly port: WorkerPort,
    private readonly options: ClientOptions = {},
  ) {
    port.on('message', this.listener)
  }

  /** Requests sent and not yet answered, including timed-out ones. */
  get inFlight(): number {
    return this.pending.length
  }

  /** Send one request and resolve with its response, whatever its type. */
  send(request: Request): Promise<Response> {
    if (this.closedReason) {
      return Promise.reject(this.closedReason)
    }

    return new Promise<Response>((resolve, reject) => {
      const entry: PendingRequest = { kind: request.type, resolve, reject, abandoned: false }

      const timeoutMs = this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
      if (timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          entry.abandoned = true
          reject(new DatabaseRequestError('TIMEOUT', `${request.type} request timed out after ${timeoutMs}ms`))
        }, timeoutMs)
      }

      this.pending.push(entry)

      try {
        this.port.postMessage(encodeMessage(request))
      } catch (err) {
        this.pending.splice(this.pending.indexOf(entry), 1)
        if (entry.timer) clearTimeout(entry.timer)
        reject(
          new DatabaseRequestError('CLOSED', `Failed to post ${request.type} request: ${errorMessage(err)}`, {
            cause: err,
          }),
        )
      }
    })
  }

  /** Open the database (InitDbFile). */
  async initialize(): Promise<void> {
    const response = await this.send({ type: 'InitDbFile', database_file: this.options.databaseFile })
    expectOk('InitDbFile', response)
  }

  /** Run statements as one atomic batch (Exec). */
  async exec(statements: readonly StatementInput[]): Promise<void> {
    const response = await this.send({
      type: 'Exec',
      database_file: this.options.databaseFile,
      statements: statements.map(toWireStatement),
    })
    expectOk('Exec', response)
  }

  /** Run one read and return every row (Query). */
  async query(sql: string, bind: readonly BindValue[] = []): Promise<Row[]> {
    const response = await this.send({
      type: 'Query',
      database_file: this.options.databaseFile,
      sql,
      bind: bind.length > 0 ? toWireBind(bind) : undefined,
    })
    switch (response.type) {
      case 'Rows':
        return response.rows.map(decodeRow)
      case 'Err':
        throw new DatabaseRequestError('REMOTE', response.message)
      case 'Ok':
        throw new DatabaseRequestError('UNEXPECTED_RESPONSE', 'Query returned Ok without rows')
    }
  }

  /** Reject every outstanding request and keep the client open. */
  failAll(error: Error): void {
    const entries = this.pending.splice(0, this.pending.length)
    for (const entry of entries) {
      if (entry.timer) clearTimeout(entry.timer)
      if (!entry.abandoned) entry.reject(error)
    }
  }

  /**
   * Stop listening and reject outstanding requests with `reason`. Later
   * requests are rejected with the same error.
   */
  close(reason = new DatabaseRequestError('CLOSED', 'Database worker client is closed')): void {
    if (this.closedReason) return
    this.closedReason = reason
    this.port.off('message', this.listener)
    this.failAll(reason)
  }

  private receive(value: unknown): void {
    // Only text frames belong to the protocol
    if (typeof value !== 'string') return

    let message: WorkerMessage
    try {
      message = decodeWorkerMessage(value)
    } catch (err) {
      this.settleNext((entry) =>
        entry.reject(
          new DatabaseRequestError('INVALID_RESPONSE', `Invalid response to ${entry.kind}: ${errorMessage(err)}`, {
            cause: err,
          }),
        ),
      )
      return
    }

    if (message.type === 'Debug') {
      this.options.onDebug?.(message.message)
      return
    }

    const response = message
    this.settleNext((entry) => entry.resolve(response))
  }

  private settleNext(settle: (entry: PendingRequest) => void): void {
    const entry = this.pending.shift()
    if (!entry) return
    if (entry.timer) clearTimeout(entry.timer)
    if (entry.abandoned) return
    settle(entry)
  }
}

function expectOk(kind: RequestKind, response: Response): void {
  switch (response.type) {
    case 'Ok':
      return
    case 'Err':
      throw new DatabaseRequestError('REMOTE', response.message)
    case 'Rows':
      throw new DatabaseRequestError('UNEXPECTED_RESPONSE', `Unexpected rows for ${kind}`)
  }
}
