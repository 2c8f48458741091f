/**
 * Loopback Transport
 *
 * In-process transport with a scriptable peer. Written bytes are echoed back
 * by default; `inject()` delivers bytes as if the peer sent them and
 * `disconnect()` simulates a fatal transport failure.
 */

import type { ByteInput } from '../types/engine.js'
import type { Transport } from '../types/transport.js'
import { append, EMPTY, toBytes } from '../utils/bytes.js'
import { createChunkQueue } from './chunk-queue.js'

/**
 * The remote side of a loopback transport
 */
export interface LoopbackPeer {
  /** Deliver bytes to the reader */
  inject(data: ByteInput): void

  /** Close cleanly from the peer's side; the reader sees end of stream */
  end(): void

  /** Fail the connection; the reader sees `error` */
  disconnect(error?: Error): void
}

export interface LoopbackTransportOptions {
  /** Echo every written chunk back to the reader (default: true) */
  echo?: boolean

  /**
   * Called for every write before it is recorded. Throwing (or rejecting)
   * fails that write.
   */
  onWrite?: (data: Buffer, peer: LoopbackPeer) => void | Promise<void>
}

export interface LoopbackTransport extends Transport, LoopbackPeer {
  /** Everything successfully written so far */
  written(): Buffer

  readonly opened: boolean
  readonly closed: boolean
}

/**
 * Create an in-process loopback transport
 *
 * @example
 * ```typescript
 * const transport = createLoopbackTransport({
 *   echo: false,
 *   onWrite: (data, peer) => peer.inject(`ack ${data.toString()}`),
 * })
 * ```
 */
export function createLoopbackTransport(options: LoopbackTransportOptions = {}): LoopbackTransport {
  const { echo = true, onWrite } = options
  const queue = createChunkQueue()

  let opened = false
  let closed = false
  let written: Buffer = EMPTY

  const peer: LoopbackPeer = {
    inject(data: ByteInput): void {
      queue.push(toBytes(data))
    },
    end(): void {
      queue.end()
    },
    disconnect(error: Error = new Error('Loopback peer disconnected')): void {
      queue.fail(error)
    },
  }

  return {
    ...peer,

    async open(): Promise<void> {
      if (closed) {
        throw new Error('Loopback transport is closed')
      }
      opened = true
    },

    read(maxBytes: number): Promise<Uint8Array | null> {
      return queue.read(maxBytes)
    },

    async write(data: Uint8Array): Promise<void> {
      if (!opened || closed || queue.finished) {
        throw new Error('Loopback transport is not writable')
      }
      const bytes = Buffer.from(data)
      if (onWrite) {
        await onWrite(bytes, peer)
      }
      written = append(written, bytes)
      if (echo) {
        queue.push(bytes)
      }
    },

    async close(): Promise<void> {
      closed = true
      queue.end()
    },

    written(): Buffer {
      return Buffer.from(written)
    },

    get opened(): boolean {
      return opened
    },

    get closed(): boolean {
      return closed
    },
  }
}
