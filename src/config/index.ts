export {
  EngineOptionsSchema,
  resolveEngineOptions,
  DEFAULT_READ_CHUNK_SIZE,
  DEFAULT_STOP_TIMEOUT_MS,
  DEFAULT_SEPARATOR,
  type ResolvedEngineOptions,
} from './options.js'
