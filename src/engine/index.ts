export { createStreamEngine, openStream } from './stream-engine.js'
export type {
  StreamEngine,
  EngineState,
  EngineOptions,
  EngineSnapshot,
  ReadLinesOptions,
  ByteInput,
  StreamEncoding,
} from '../types/engine.js'
