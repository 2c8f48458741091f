// Transport types
export type { Transport } from './transport.js'

// Engine types
export type {
  EngineState,
  ByteInput,
  StreamEncoding,
  EngineOptions,
  ReadLinesOptions,
  EngineSnapshot,
  StreamEngine,
} from './engine.js'

// Cursor types
export type { StreamCursor } from './cursor.js'
