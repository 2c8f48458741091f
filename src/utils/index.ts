/**
 * wirestream Utilities
 */

// ID Generation
export { sid } from './id.js'

// Bytes
export { toBytes, append, copySlice, EMPTY } from './bytes.js'

// Logger
export { createLogger } from './logger.js'
