/** Ways a request can fail as seen from the host */
export type DatabaseRequestErrorCode =
  | 'REMOTE'
  | 'TIMEOUT'
  | 'CLOSED'
  | 'UNEXPECTED_RESPONSE'
  | 'INVALID_RESPONSE'

/** Host-side request failure with a typed code */
export class DatabaseRequestError extends Error {
  readonly code: DatabaseRequestErrorCode

  constructor(code: DatabaseRequestErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DatabaseRequestError'
    this.code = code
  }
}

/** A row lacks a column, or the column holds the wrong type */
export class RowShapeError extends Error {
  readonly column: string

  constructor(column: string, message: string) {
    super(message)
    this.name = 'RowShapeError'
    this.column = column
  }
}
