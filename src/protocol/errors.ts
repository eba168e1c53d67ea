/** Error codes a request can fail with inside the worker. */
export type WorkerErrorCode =
  | 'REQUEST_DECODE'
  | 'UNKNOWN_REQUEST_KIND'
  | 'STORAGE_UNAVAILABLE'
  | 'INVALID_DATABASE_FILE'
  | 'STATEMENT_EXECUTION'

export interface WorkerErrorOptions {
  cause?: unknown
  /** Zero-based position of the failing statement within its batch. */
  statementIndex?: number
}

/** Worker-side failure with a typed code. The message is what the caller sees in `Err`. */
export class WorkerError extends Error {
  readonly code: WorkerErrorCode
  readonly statementIndex?: number

  constructor(code: WorkerErrorCode, message: string, options: WorkerErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'WorkerError'
    this.code = code
    this.statementIndex = options.statementIndex
  }
}

/** Message text of anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
