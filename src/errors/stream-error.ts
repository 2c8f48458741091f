/**
 * Stream Errors
 *
 * Tagged error variants raised by the engine. Narrow with `instanceof` or by
 * the `code` tag.
 */

import type { EngineState } from '../types/engine.js'
import type { ErrorPayload } from './payload.js'

/**
 * Base class for every error the engine raises
 */
export class StreamError extends Error {
  constructor(
    /** String error code (e.g., 'TRANSPORT_ERROR') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'StreamError'
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Underlying I/O failure.
 *
 * Raised by the reader path with a payload, and by `write()` without one.
 */
export class TransportError extends StreamError {
  declare readonly code: 'TRANSPORT_ERROR'

  constructor(
    message: string,
    public readonly payload: ErrorPayload | null,
    options?: { cause?: unknown }
  ) {
    super('TRANSPORT_ERROR', message, undefined, options)
    this.name = 'TransportError'
  }

  override toJSON(): { code: string; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.payload && { details: this.payload.toJSON() }),
    }
  }
}

export class StreamTimeoutError extends StreamError {
  declare readonly code: 'DEADLINE_EXCEEDED'

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super('DEADLINE_EXCEEDED', `Operation '${operation}' timed out after ${timeoutMs}ms`, {
      operation,
      timeoutMs,
    })
    this.name = 'StreamTimeoutError'
  }
}

export class LifecycleError extends StreamError {
  declare readonly code: 'FAILED_PRECONDITION'

  constructor(
    public readonly operation: string,
    public readonly state: EngineState
  ) {
    super('FAILED_PRECONDITION', `Cannot ${operation} a stream in state: ${state}`, {
      operation,
      state,
    })
    this.name = 'LifecycleError'
  }
}

export class InvalidArgumentError extends StreamError {
  declare readonly code: 'INVALID_ARGUMENT'

  constructor(message: string, details?: unknown) {
    super('INVALID_ARGUMENT', message, details)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Check if a value is any wirestream error
 */
export function isStreamError(value: unknown): value is StreamError {
  return value instanceof StreamError
}

/**
 * Check if a value is a transport failure
 */
export function isTransportError(value: unknown): value is TransportError {
  return value instanceof TransportError
}
