/**
 * Error Module Tests
 */

import { describe, it, expect } from 'vitest'
import { Errors, describeCause } from './factories.js'
import { ErrorCodes, getErrorCode, isFatal } from './codes.js'
import { ErrorPayload } from './payload.js'
import {
  InvalidArgumentError,
  LifecycleError,
  StreamError,
  StreamTimeoutError,
  TransportError,
  isStreamError,
  isTransportError,
} from './stream-error.js'

describe('ErrorCodes', () => {
  it('should have consistent code and key', () => {
    for (const [key, def] of Object.entries(ErrorCodes)) {
      expect(def.code).toBe(key)
    }
  })

  it('should mark only transport failures as fatal', () => {
    expect(isFatal('TRANSPORT_ERROR')).toBe(true)
    expect(isFatal('DEADLINE_EXCEEDED')).toBe(false)
    expect(isFatal('FAILED_PRECONDITION')).toBe(false)
    expect(isFatal('INVALID_ARGUMENT')).toBe(false)
  })

  it('should return a non-fatal definition for unknown codes', () => {
    expect(getErrorCode('CUSTOM')).toEqual({ code: 'CUSTOM', message: 'CUSTOM', fatal: false })
  })
})

describe('ErrorPayload', () => {
  it('should copy its inputs', () => {
    const read = Buffer.from('hello ')
    const payload = new ErrorPayload(read, Buffer.from('cmd\n'))
    read.write('HELLO ')

    expect(payload.readSnapshot.toString()).toBe('hello ')
    expect(payload.writeSnapshot.toString()).toBe('cmd\n')
  })

  it('should hand out copies', () => {
    const payload = new ErrorPayload(Buffer.from('abc'), Buffer.alloc(0))
    payload.readSnapshot.fill(0)

    expect(payload.readSnapshot.toString()).toBe('abc')
    expect(payload.readLength).toBe(3)
    expect(payload.writeLength).toBe(0)
  })

  it('should serialize both snapshots as text', () => {
    const payload = new ErrorPayload(Buffer.from('out'), Buffer.from('in'))
    expect(payload.toJSON()).toEqual({ read: 'out', write: 'in', readLength: 3, writeLength: 2 })
  })
})

describe('Errors', () => {
  it('should create transport errors without payload', () => {
    const cause = new Error('EPIPE')
    const err = Errors.transport(cause)

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toBeInstanceOf(StreamError)
    expect(err.code).toBe('TRANSPORT_ERROR')
    expect(err.message).toBe('Transport failure: EPIPE')
    expect(err.payload).toBeNull()
    expect(err.cause).toBe(cause)
    expect(err.toJSON()).toEqual({ code: 'TRANSPORT_ERROR', message: 'Transport failure: EPIPE' })
  })

  it('should attach the payload to transport errors', () => {
    const payload = new ErrorPayload(Buffer.from('a'), Buffer.from('b'))
    const err = Errors.transport('reset', payload)

    expect(err.message).toBe('Transport failure: reset')
    expect(err.payload).toBe(payload)
    expect(err.toJSON()).toEqual({
      code: 'TRANSPORT_ERROR',
      message: 'Transport failure: reset',
      details: { read: 'a', write: 'b', readLength: 1, writeLength: 1 },
    })
  })

  it('should create timeout errors', () => {
    const err = Errors.timeout('readUntil', 100)

    expect(err).toBeInstanceOf(StreamTimeoutError)
    expect(err.code).toBe('DEADLINE_EXCEEDED')
    expect(err.message).toBe("Operation 'readUntil' timed out after 100ms")
    expect(err.timeoutMs).toBe(100)
    expect(err.details).toEqual({ operation: 'readUntil', timeoutMs: 100 })
  })

  it('should create lifecycle errors', () => {
    const err = Errors.lifecycle('write', 'stopped')

    expect(err).toBeInstanceOf(LifecycleError)
    expect(err.code).toBe('FAILED_PRECONDITION')
    expect(err.message).toBe('Cannot write a stream in state: stopped')
    expect(err.state).toBe('stopped')
  })

  it('should create invalid argument errors', () => {
    const err = Errors.invalidArgument('Marker must not be empty', { field: 'marker' })

    expect(err).toBeInstanceOf(InvalidArgumentError)
    expect(err.code).toBe('INVALID_ARGUMENT')
    expect(err.details).toEqual({ field: 'marker' })
  })
})

describe('type guards', () => {
  it('should narrow stream and transport errors', () => {
    expect(isStreamError(Errors.timeout('x', 1))).toBe(true)
    expect(isStreamError(new Error('plain'))).toBe(false)
    expect(isTransportError(Errors.transport('x'))).toBe(true)
    expect(isTransportError(Errors.lifecycle('start', 'running'))).toBe(false)
  })
})

describe('describeCause', () => {
  it('should describe errors, strings and other values', () => {
    expect(describeCause(new Error('boom'))).toBe('boom')
    expect(describeCause('text')).toBe('text')
    expect(describeCause(42)).toBe('42')
  })
})
