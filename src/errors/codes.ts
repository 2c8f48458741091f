/**
 * Error Codes
 *
 * Central definition of every wirestream error code. Each code carries a
 * default message and whether it leaves the stream unusable.
 *
 * - fatal: the engine reached a terminal state; construct a new one
 * - non-fatal: the call failed but the engine keeps running
 */

/**
 * Error code definition
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'TRANSPORT_ERROR') */
  code: string
  /** Default message */
  message: string
  /** Whether the engine is unusable after this error */
  fatal: boolean
}

/**
 * All wirestream error codes
 */
export const ErrorCodes = {
  /** Underlying I/O failure, disconnect, or close signal */
  TRANSPORT_ERROR: {
    code: 'TRANSPORT_ERROR',
    message: 'Transport failure',
    fatal: true,
  },

  /** A read deadline elapsed; buffers are left untouched */
  DEADLINE_EXCEEDED: {
    code: 'DEADLINE_EXCEEDED',
    message: 'Deadline exceeded',
    fatal: false,
  },

  /** Operation not valid in the engine's current state */
  FAILED_PRECONDITION: {
    code: 'FAILED_PRECONDITION',
    message: 'Invalid stream state',
    fatal: false,
  },

  /** Rejected argument or option */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    message: 'Invalid argument',
    fatal: false,
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  const def = Object.values(ErrorCodes).find((entry) => entry.code === code)
  if (def) {
    return def
  }

  return {
    code,
    message: code,
    fatal: false,
  }
}

/**
 * Check whether an error code leaves the engine in a terminal state
 */
export function isFatal(code: string): boolean {
  return getErrorCode(code).fatal
}
