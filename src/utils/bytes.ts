/**
 * Byte helpers shared by the engine and transports.
 */

import type { ByteInput, StreamEncoding } from '../types/engine.js'

export const EMPTY = Buffer.alloc(0)

/**
 * Encode input as a Buffer. Strings use `encoding`; byte input is copied.
 */
export function toBytes(data: ByteInput, encoding: StreamEncoding = 'utf8'): Buffer {
  return typeof data === 'string' ? Buffer.from(data, encoding) : Buffer.from(data)
}

/**
 * Append `chunk` to `buffer`, returning a new Buffer
 */
export function append(buffer: Buffer, chunk: Uint8Array): Buffer {
  if (chunk.length === 0) return buffer
  return Buffer.concat([buffer, chunk])
}

/**
 * Copy `buffer[start, end)` so the result shares no memory with the source
 */
export function copySlice(buffer: Buffer, start: number, end: number = buffer.length): Buffer {
  return Buffer.from(buffer.subarray(start, end))
}
