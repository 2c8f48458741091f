/**
 * TCP Transport
 *
 * Raw byte stream over a TCP connection. No framing: whatever the peer
 * sends lands in the engine's read buffer as-is.
 */

import { createConnection, type Socket } from 'node:net'
import type { Transport } from '../types/transport.js'
import { createDuplexTransport } from './duplex.js'

const DEFAULT_CONNECT_TIMEOUT_MS = 10000

/**
 * TCP transport configuration
 */
export interface TcpTransportOptions {
  /** Host to connect to */
  host: string

  /** Port to connect to */
  port: number

  /** Give up connecting after this many ms (default: 10000, 0 to disable) */
  connectTimeoutMs?: number

  /** Disable Nagle's algorithm (default: true) */
  noDelay?: boolean

  /** Keep-alive interval in ms (default: 30000, 0 to disable) */
  keepAliveInterval?: number
}

/**
 * Open a TCP socket, resolving once connected
 */
function connectSocket(options: Required<TcpTransportOptions>): Promise<Socket> {
  const { host, port, connectTimeoutMs, noDelay, keepAliveInterval } = options

  return new Promise((resolve, reject) => {
    const socket = createConnection({ host, port })
    let timer: ReturnType<typeof setTimeout> | null = null

    const onError = (err: Error) => {
      if (timer) clearTimeout(timer)
      reject(err)
    }

    if (connectTimeoutMs > 0) {
      timer = setTimeout(() => {
        socket.off('error', onError)
        socket.destroy()
        reject(new Error(`Connection to ${host}:${port} timed out after ${connectTimeoutMs}ms`))
      }, connectTimeoutMs)
    }

    socket.once('error', onError)
    socket.once('connect', () => {
      if (timer) clearTimeout(timer)
      socket.off('error', onError)

      socket.setNoDelay(noDelay)
      if (keepAliveInterval > 0) {
        socket.setKeepAlive(true, keepAliveInterval)
      }
      resolve(socket)
    })
  })
}

/**
 * Create a TCP transport. The connection is made by `open()`.
 *
 * @example
 * ```typescript
 * const engine = createStreamEngine(createTcpTransport({ host: '10.0.0.5', port: 2323 }))
 * await engine.start()
 * await engine.write('status\n')
 * const reply = await engine.readUntil('> ', 2000)
 * ```
 */
export function createTcpTransport(options: TcpTransportOptions): Transport {
  const resolved: Required<TcpTransportOptions> = {
    host: options.host,
    port: options.port,
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    noDelay: options.noDelay ?? true,
    keepAliveInterval: options.keepAliveInterval ?? 30000,
  }

  return createDuplexTransport({
    name: `tcp://${resolved.host}:${resolved.port}`,
    connect: () => connectSocket(resolved),
  })
}
