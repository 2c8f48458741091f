/**
 * Error Module
 *
 * Error payload, tagged error types, factories and code definitions.
 */

export { Errors, describeCause } from './factories.js'
export { ErrorPayload } from './payload.js'
export {
  StreamError,
  TransportError,
  StreamTimeoutError,
  LifecycleError,
  InvalidArgumentError,
  isStreamError,
  isTransportError,
} from './stream-error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  isFatal,
} from './codes.js'
