/**
 * Stream Engine
 *
 * Buffered duplex byte stream over a Transport. A background reader task
 * pulls chunks into the read buffer while callers write commands and wait
 * for markers in the accumulated output.
 *
 * Concurrency model:
 * - Every read, mutation or state transition of the buffers happens inside a
 *   synchronous section (no `await` in between), so no other caller can
 *   observe a half-updated engine. That is the engine's lock.
 * - Blocked callers are waiters with a predicate; `notify()` re-runs every
 *   predicate after each append and each terminal transition.
 * - Transport writes run outside those sections, queued on one promise chain
 *   so the write history keeps call order.
 * - The only way to interrupt an in-flight `transport.read()` is
 *   `transport.close()`, which is what `stop()` does.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import { resolveEngineOptions } from '../config/options.js'
import { Errors } from '../errors/factories.js'
import { ErrorPayload } from '../errors/payload.js'
import type { StreamError, TransportError } from '../errors/stream-error.js'
import type {
  ByteInput,
  EngineOptions,
  EngineSnapshot,
  EngineState,
  ReadLinesOptions,
  StreamEngine,
} from '../types/engine.js'
import type { Transport } from '../types/transport.js'
import { append, copySlice, EMPTY, toBytes } from '../utils/bytes.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('stream-engine')

/** Largest delay setTimeout honours */
const MAX_TIMEOUT_MS = 2_147_483_647

/**
 * Blocked caller
 */
interface Waiter {
  /** Settle the caller if its condition holds; returns true once settled */
  check: () => boolean
  timer: ReturnType<typeof setTimeout> | null
}

/**
 * Creates a new StreamEngine over `transport`
 */
export function createStreamEngine(transport: Transport, options: EngineOptions = {}): StreamEngine {
  const { id, readChunkSize, stopTimeoutMs, separator, encoding } = resolveEngineOptions(options)
  const log = logger.child({ engineId: id })

  // State
  let state: EngineState = 'created'
  let lastError: TransportError | null = null
  let stopRequested = false

  // Buffers
  let readBuffer: Buffer = EMPTY
  let writeHistory: Buffer = EMPTY
  let drainedBytes = 0
  let pendingWrites = 0

  // Tasks
  let readerTask: Promise<void> | null = null
  let stopTask: Promise<void> | null = null
  let writeChain: Promise<void> = Promise.resolve()
  const waiters = new Set<Waiter>()

  function isTerminal(): boolean {
    return state === 'stopped' || state === 'errored'
  }

  /**
   * Wake every waiter so it re-checks its condition
   */
  function notify(): void {
    for (const waiter of [...waiters]) {
      if (waiter.check()) {
        waiters.delete(waiter)
        if (waiter.timer) clearTimeout(waiter.timer)
      }
    }
  }

  /**
   * Error a blocked or new read observes once the engine is terminal
   */
  function terminalFailure(operation: string): StreamError | null {
    if (state === 'errored') return lastError ?? Errors.lifecycle(operation, state)
    if (state === 'stopped') return Errors.lifecycle(operation, state)
    return null
  }

  function validateTimeout(timeoutMs: number | undefined): void {
    if (timeoutMs === undefined) return
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw Errors.invalidArgument(
        `timeoutMs must be a number between 0 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`
      )
    }
  }

  /**
   * Byte length of the first `maxLines` non-skipped lines, counting skipped
   * lines in between, or undefined while fewer are buffered
   */
  function measureLines(
    maxLines: number,
    skip: ((line: Buffer) => boolean) | undefined
  ): number | undefined {
    let end = 0
    let collected = 0
    while (collected < maxLines) {
      const index = readBuffer.indexOf(separator, end)
      if (index === -1) return undefined
      const next = index + separator.length
      if (!skip || !skip(copySlice(readBuffer, end, next))) collected++
      end = next
    }
    return end
  }

  /**
   * Split taken bytes into lines, dropping skipped ones
   */
  function splitLines(bytes: Buffer, skip: ((line: Buffer) => boolean) | undefined): Buffer[] {
    const lines: Buffer[] = []
    let start = 0
    while (start < bytes.length) {
      const index = bytes.indexOf(separator, start)
      const next = index === -1 ? bytes.length : index + separator.length
      const line = copySlice(bytes, start, next)
      if (!skip || !skip(line)) lines.push(line)
      start = next
    }
    return lines
  }

  /**
   * Resolve with `attempt()`'s value as soon as it returns one.
   * Rejects when the engine turns terminal or the deadline passes.
   */
  function waitFor<T>(
    operation: string,
    attempt: () => T | undefined,
    timeoutMs: number | undefined
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter = {
        timer: null,
        check: () => {
          const failure = terminalFailure(operation)
          if (failure) {
            reject(failure)
            return true
          }
          const value = attempt()
          if (value === undefined) return false
          resolve(value)
          return true
        },
      }

      if (waiter.check()) return

      waiters.add(waiter)
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          // Expiry never touches the buffer
          waiters.delete(waiter)
          reject(Errors.timeout(operation, timeoutMs))
        }, timeoutMs)
      }
    })
  }

  /**
   * Remove and return the first `count` bytes of the read buffer
   */
  function take(count: number): Buffer {
    const out = copySlice(readBuffer, 0, count)
    readBuffer = copySlice(readBuffer, count)
    drainedBytes += count
    return out
  }

  // === Terminal transitions ===

  function markStopped(): void {
    if (isTerminal()) return
    state = 'stopped'
    log.debug('Stream stopped')
    notify()
  }

  /**
   * Reader-path failure: snapshot both buffers and enter 'errored'.
   * A failure caused by stop() closing the transport is a plain stop.
   */
  function captureFailure(cause: unknown): void {
    if (isTerminal()) return
    if (stopRequested) {
      markStopped()
      return
    }

    const payload = new ErrorPayload(readBuffer, writeHistory)
    lastError = Errors.transport(cause, payload)
    state = 'errored'
    log.error(
      { err: cause, readBytes: payload.readLength, writtenBytes: payload.writeLength },
      'Transport failed, stream errored'
    )
    notify()
  }

  // === Background reader ===

  async function openTransport(): Promise<boolean> {
    try {
      await transport.open()
      log.debug('Transport open')
      return true
    } catch (err) {
      captureFailure(err)
      return false
    }
  }

  async function runReader(): Promise<void> {
    log.debug({ readChunkSize }, 'Reader started')

    while (!stopRequested) {
      let chunk: Uint8Array | null
      try {
        chunk = await transport.read(readChunkSize)
      } catch (err) {
        captureFailure(err)
        break
      }

      if (chunk === null) {
        captureFailure(Errors.closedByPeer())
        break
      }
      if (isTerminal()) break

      if (chunk.length === 0) {
        await yieldToEventLoop()
        continue
      }

      readBuffer = append(readBuffer, chunk)
      notify()
    }

    if (state === 'errored') {
      // Release the handle; the captured payload stays readable
      await closeTransport()
      return
    }
    markStopped()
  }

  /**
   * Wait for the reader task, giving up after stopTimeoutMs
   */
  async function joinReader(task: Promise<void>): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), stopTimeoutMs)
    })

    try {
      return await Promise.race([task.then(() => true as const), timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  async function closeTransport(): Promise<void> {
    try {
      await transport.close()
    } catch (err) {
      log.warn({ err }, 'Transport close failed')
    }
  }

  async function shutdown(): Promise<void> {
    stopRequested = true

    if (state === 'created') {
      markStopped()
      await closeTransport()
      return
    }

    state = 'stopping'
    log.debug('Stopping stream')
    await closeTransport()

    if (readerTask) {
      const exited = await joinReader(readerTask)
      if (!exited) {
        log.warn({ stopTimeoutMs }, 'Reader did not exit before stop timeout')
      }
    }

    markStopped()
  }

  // === Public surface ===

  const engine: StreamEngine = {
    // === Lifecycle ===

    async start(): Promise<void> {
      if (state !== 'created') {
        throw Errors.lifecycle('start', state)
      }

      state = 'running'
      const opening = openTransport()
      writeChain = opening.then(() => undefined)
      readerTask = opening
        .then((opened) => (opened ? runReader() : closeTransport()))
        .catch((err: unknown) => captureFailure(err))

      if (!(await opening)) {
        throw lastError ?? Errors.lifecycle('start', state)
      }
    },

    stop(): Promise<void> {
      if (isTerminal()) return Promise.resolve()
      if (!stopTask) {
        stopTask = shutdown()
      }
      return stopTask
    },

    // === Writing ===

    write(data: ByteInput): Promise<void> {
      if (state !== 'running' && state !== 'stopping') {
        return Promise.reject(Errors.lifecycle('write', state))
      }

      const bytes = toBytes(data, encoding)
      pendingWrites += bytes.length

      const result = writeChain
        .then(async () => {
          if (isTerminal()) {
            throw Errors.lifecycle('write', state)
          }
          try {
            await transport.write(bytes)
          } catch (err) {
            throw Errors.transport(err)
          }
          if (!isTerminal()) {
            writeHistory = append(writeHistory, bytes)
          }
        })
        .finally(() => {
          pendingWrites -= bytes.length
        })

      // The caller observes failures through `result`; later writes still run.
      writeChain = result.catch(() => undefined)
      return result
    },

    // === Reading ===

    readUntil(marker: ByteInput, timeoutMs?: number): Promise<Buffer> {
      const needle = toBytes(marker, encoding)
      if (needle.length === 0) {
        return Promise.reject(Errors.invalidArgument('Marker must not be empty'))
      }
      try {
        validateTimeout(timeoutMs)
      } catch (err) {
        return Promise.reject(err)
      }

      return waitFor(
        'readUntil',
        () => {
          const index = readBuffer.indexOf(needle)
          return index === -1 ? undefined : take(index + needle.length)
        },
        timeoutMs
      )
    },

    readLine(timeoutMs?: number): Promise<Buffer> {
      return engine.readUntil(separator, timeoutMs)
    },

    readLines(maxLines: number, readOptions: ReadLinesOptions = {}): Promise<Buffer[]> {
      if (!Number.isInteger(maxLines) || maxLines < 0) {
        return Promise.reject(
          Errors.invalidArgument(`maxLines must be a non-negative integer, got ${maxLines}`)
        )
      }
      const { skip, timeoutMs } = readOptions
      try {
        validateTimeout(timeoutMs)
      } catch (err) {
        return Promise.reject(err)
      }

      // All lines are taken together, or none are
      return waitFor(
        'readLines',
        () => {
          const end = measureLines(maxLines, skip)
          return end === undefined ? undefined : splitLines(take(end), skip)
        },
        timeoutMs
      )
    },

    consumeBuffer(): Buffer {
      const out = readBuffer
      readBuffer = EMPTY
      drainedBytes += out.length
      return out
    },

    // === Inspection ===

    peek(start: number = 0, end: number = readBuffer.length): Buffer {
      const from = Math.max(0, Math.min(start, readBuffer.length))
      const to = Math.max(from, Math.min(end, readBuffer.length))
      return copySlice(readBuffer, from, to)
    },

    contains(marker: ByteInput): boolean {
      return readBuffer.includes(toBytes(marker, encoding))
    },

    indexOf(marker: ByteInput): number {
      return readBuffer.indexOf(toBytes(marker, encoding))
    },

    inspect(check: (buffer: Buffer) => boolean): boolean {
      return check(copySlice(readBuffer, 0))
    },

    snapshot(): EngineSnapshot {
      return {
        read: copySlice(readBuffer, 0),
        written: copySlice(writeHistory, 0),
      }
    },

    // === State ===

    id,

    get state(): EngineState {
      return state
    },

    get lastError(): TransportError | null {
      return lastError
    },

    get bufferedLength(): number {
      return readBuffer.length
    },

    get drainedBytes(): number {
      return drainedBytes
    },

    get pendingWrites(): number {
      return pendingWrites
    },
  }

  return engine
}

/**
 * Create an engine and start it
 *
 * @example
 * ```typescript
 * const engine = await openStream(createTcpTransport({ host: '127.0.0.1', port: 2323 }))
 * await engine.write('help\n')
 * const banner = await engine.readUntil('> ', 1000)
 * ```
 */
export async function openStream(transport: Transport, options: EngineOptions = {}): Promise<StreamEngine> {
  const engine = createStreamEngine(transport, options)
  await engine.start()
  return engine
}
