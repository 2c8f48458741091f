/**
 * Duplex Transport
 *
 * Adapts any Node Duplex (TCP socket, SSH channel) to the Transport contract.
 * Incoming 'data' events feed a ChunkQueue; 'end' and 'close' end it and
 * 'error' fails it, so a pending read always settles.
 */

import type { Duplex } from 'node:stream'
import type { Transport } from '../types/transport.js'
import { createLogger } from '../utils/logger.js'
import { createChunkQueue } from './chunk-queue.js'

const logger = createLogger('duplex-transport')

/**
 * Hooks a concrete adapter provides
 */
export interface DuplexTransportHooks {
  /** Name used in log lines (e.g. 'tcp://127.0.0.1:4000') */
  name: string

  /**
   * Establish the connection and return the byte stream.
   * `fail` reports errors raised outside the stream itself (e.g. the SSH client).
   */
  connect(fail: (error: Error) => void): Promise<Duplex>

  /** Release resources beyond the stream (called once, after the stream is destroyed) */
  disconnect?(): void | Promise<void>
}

/**
 * Create a Transport over a Duplex stream
 */
export function createDuplexTransport(hooks: DuplexTransportHooks): Transport {
  const queue = createChunkQueue()
  const log = logger.child({ transport: hooks.name })

  let duplex: Duplex | null = null
  let opening = false
  let closed = false

  function attach(stream: Duplex): void {
    stream.on('data', (chunk: Buffer | string) => {
      queue.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk)
    })
    stream.on('end', () => {
      log.debug('Peer ended stream')
      queue.end()
    })
    stream.on('close', () => {
      queue.end()
    })
    stream.on('error', (err: Error) => {
      log.debug({ err }, 'Stream error')
      queue.fail(err)
    })
  }

  return {
    async open(): Promise<void> {
      if (opening || duplex) {
        throw new Error(`Transport ${hooks.name} is already open`)
      }
      if (closed) {
        throw new Error(`Transport ${hooks.name} is closed`)
      }
      opening = true

      let stream: Duplex
      try {
        stream = await hooks.connect((err) => queue.fail(err))
      } finally {
        opening = false
      }

      if (closed) {
        stream.destroy()
        await hooks.disconnect?.()
        throw new Error(`Transport ${hooks.name} was closed while opening`)
      }

      duplex = stream
      attach(stream)
      log.debug('Transport open')
    },

    read(maxBytes: number): Promise<Uint8Array | null> {
      return queue.read(maxBytes)
    },

    write(data: Uint8Array): Promise<void> {
      return new Promise((resolve, reject) => {
        const stream = duplex
        if (closed || !stream || stream.destroyed || !stream.writable) {
          reject(new Error(`Transport ${hooks.name} is not writable`))
          return
        }
        stream.write(data, (err) => {
          if (err) {
            reject(err)
          } else {
            resolve()
          }
        })
      })
    },

    async close(): Promise<void> {
      if (closed) return
      closed = true
      queue.end()

      if (duplex) {
        duplex.destroy()
        duplex = null
        await hooks.disconnect?.()
      }
      log.debug('Transport closed')
    },
  }
}
