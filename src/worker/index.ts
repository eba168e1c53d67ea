export {
  ProtocolDispatcher,
  createDispatcher,
  createTraceSink,
  type DispatcherOptions,
  type MessageSink,
  type FaultHandler,
} from './dispatcher.js'
export { serve, startWorker, type ServedWorker } from './serve.js'
