/**
 * wirestream - Buffered duplex byte streams
 *
 * One background reader per connection, any number of callers writing
 * commands and waiting on markers in the output.
 */

// === Engine ===
export { createStreamEngine, openStream } from './engine/index.js'

// === Cursor ===
export { createCursor } from './cursor/index.js'

// === Transports ===
export {
  createTcpTransport,
  createSshTransport,
  buildSshConnectConfig,
  createHostVerifier,
  SshTransportOptionsSchema,
  createLoopbackTransport,
  createDuplexTransport,
  createChunkQueue,
} from './transports/index.js'
export type {
  TcpTransportOptions,
  SshTransport,
  SshTransportOptions,
  LoopbackTransport,
  LoopbackTransportOptions,
  LoopbackPeer,
  DuplexTransportHooks,
  ChunkQueue,
} from './transports/index.js'

// === Errors ===
export {
  Errors,
  ErrorCodes,
  StreamError,
  TransportError,
  StreamTimeoutError,
  LifecycleError,
  InvalidArgumentError,
  isStreamError,
  isTransportError,
  getErrorCode,
  isFatal,
} from './errors/index.js'
// ErrorPayload is built by the engine only; it is exported as a type.
export type { ErrorCode, ErrorCodeDef, ErrorPayload } from './errors/index.js'

// === Config ===
export {
  EngineOptionsSchema,
  resolveEngineOptions,
  DEFAULT_READ_CHUNK_SIZE,
  DEFAULT_STOP_TIMEOUT_MS,
  DEFAULT_SEPARATOR,
} from './config/index.js'
export type { ResolvedEngineOptions } from './config/index.js'

// === Types ===
export type {
  Transport,
  EngineState,
  ByteInput,
  StreamEncoding,
  EngineOptions,
  ReadLinesOptions,
  EngineSnapshot,
  StreamEngine,
  StreamCursor,
} from './types/index.js'

// === Utilities ===
export { createLogger, sid } from './utils/index.js'
