export {
  RequestSchema,
  ResponseSchema,
  DebugMessageSchema,
  WorkerMessageSchema,
  WireBindValueSchema,
  WireStatementSchema,
  REQUEST_KINDS,
  type Request,
  type RequestKind,
  type Response,
  type DebugMessage,
  type WorkerMessage,
  type WireBindValue,
  type WireStatement,
  type WireRow,
} from './messages.js'
export { WorkerError, errorMessage, type WorkerErrorCode } from './errors.js'
export {
  decodeRequest,
  decodeWorkerMessage,
  encodeMessage,
  encodeRow,
  decodeRow,
  toStatement,
  toWireStatement,
  toWireBind,
  type SqlValue,
  type Row,
  type BindValue,
  type StatementInput,
} from './codec.js'
