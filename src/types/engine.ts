/**
 * Stream Engine Types
 *
 * Buffered duplex byte stream driven by a background reader.
 */

import type { TransportError } from '../errors/stream-error.js'

/**
 * Engine lifecycle state.
 *
 * created -> running -> stopping -> stopped
 *                    \-> errored
 */
export type EngineState = 'created' | 'running' | 'stopping' | 'stopped' | 'errored'

/**
 * Bytes accepted wherever the engine takes input. Strings are encoded with
 * the engine's configured encoding.
 */
export type ByteInput = string | Uint8Array

/**
 * Supported string encodings for markers and written text
 */
export type StreamEncoding = 'utf8' | 'ascii' | 'latin1' | 'binary'

/**
 * Engine configuration options
 */
export interface EngineOptions {
  /** Engine ID for log correlation (auto-generated if not provided) */
  id?: string
  /** Max bytes requested from the transport per read (default: 4096) */
  readChunkSize?: number
  /** How long stop() waits for the reader to exit, in ms (default: 1000) */
  stopTimeoutMs?: number
  /** Line separator used by readLine/readLines (default: '\n') */
  separator?: ByteInput
  /** Encoding for string markers and written strings (default: 'utf8') */
  encoding?: StreamEncoding
}

/**
 * Options for readLines()
 */
export interface ReadLinesOptions {
  /** Return true to drop a line; dropped lines do not count towards maxLines */
  skip?: (line: Buffer) => boolean
  /** Deadline for the whole call; on expiry no line is consumed */
  timeoutMs?: number
}

/**
 * Both buffers, copied together
 */
export interface EngineSnapshot {
  read: Buffer
  written: Buffer
}

/**
 * Stream Engine interface
 */
export interface StreamEngine {
  // === Lifecycle ===

  /** Open the transport and spawn the background reader. Valid only from 'created'. */
  start(): Promise<void>

  /** Close the transport and wait (bounded) for the reader to exit. Idempotent. */
  stop(): Promise<void>

  // === Writing ===

  /** Send bytes. Valid while 'running' or 'stopping'. */
  write(data: ByteInput): Promise<void>

  // === Reading ===

  /** Resolve with, and consume, everything up to and including the first `marker` */
  readUntil(marker: ByteInput, timeoutMs?: number): Promise<Buffer>

  /** readUntil(separator) */
  readLine(timeoutMs?: number): Promise<Buffer>

  /**
   * Resolve with `maxLines` lines that are not skipped, consuming them (and
   * the skipped lines between them) only once all are buffered.
   * `skip` may run more than once per line.
   */
  readLines(maxLines: number, options?: ReadLinesOptions): Promise<Buffer[]>

  /** Capture and clear the whole read buffer */
  consumeBuffer(): Buffer

  // === Inspection (non-consuming) ===

  /** Copy of readBuffer[start, end) */
  peek(start?: number, end?: number): Buffer

  /** Whether the read buffer currently contains `marker` */
  contains(marker: ByteInput): boolean

  /** Index of the first `marker` in the read buffer, or -1 */
  indexOf(marker: ByteInput): number

  /** Run `check` against a copy of the read buffer */
  inspect(check: (buffer: Buffer) => boolean): boolean

  /** Copy of both buffers, taken together */
  snapshot(): EngineSnapshot

  // === State ===

  readonly id: string
  readonly state: EngineState

  /** The fatal transport error, once the engine is 'errored' */
  readonly lastError: TransportError | null

  /** Bytes currently in the read buffer */
  readonly bufferedLength: number

  /** Bytes ever removed from the front of the read buffer */
  readonly drainedBytes: number

  /** Bytes passed to write() whose transport write has not settled yet */
  readonly pendingWrites: number
}
