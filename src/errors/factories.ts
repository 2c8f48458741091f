/**
 * Error Factories
 *
 * Pre-built helpers for the errors the engine and transports raise.
 */

import type { EngineState } from '../types/engine.js'
import { ErrorCodes } from './codes.js'
import type { ErrorPayload } from './payload.js'
import {
  InvalidArgumentError,
  LifecycleError,
  StreamTimeoutError,
  TransportError,
} from './stream-error.js'

/**
 * Describe an unknown thrown value
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (typeof cause === 'string') return cause
  return String(cause)
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.lifecycle('write', 'stopped')
 * // Creates: { code: 'FAILED_PRECONDITION', message: "Cannot write a stream in state: stopped" }
 *
 * throw Errors.timeout('readUntil', 100)
 * // Creates: { code: 'DEADLINE_EXCEEDED', message: "Operation 'readUntil' timed out after 100ms" }
 * ```
 */
export const Errors = {
  /**
   * Transport failure
   * @param cause - Error raised by the transport
   * @param payload - Snapshot captured by the reader path (omitted for write failures)
   */
  transport(cause: unknown, payload: ErrorPayload | null = null): TransportError {
    return new TransportError(
      `${ErrorCodes.TRANSPORT_ERROR.message}: ${describeCause(cause)}`,
      payload,
      { cause }
    )
  },

  /**
   * Peer closed the stream
   */
  closedByPeer(): Error {
    return new Error('Connection closed by peer')
  },

  /**
   * Read deadline exceeded
   * @param operation - What operation timed out
   * @param timeoutMs - The deadline that elapsed
   */
  timeout(operation: string, timeoutMs: number): StreamTimeoutError {
    return new StreamTimeoutError(operation, timeoutMs)
  },

  /**
   * Operation not valid in the current state
   * @param operation - The rejected operation
   * @param state - The engine's state at the time
   */
  lifecycle(operation: string, state: EngineState): LifecycleError {
    return new LifecycleError(operation, state)
  },

  /**
   * Bad argument or option
   * @param message - What was wrong
   * @param details - Optional additional details
   */
  invalidArgument(message: string, details?: unknown): InvalidArgumentError {
    return new InvalidArgumentError(message, details)
  },
} as const
