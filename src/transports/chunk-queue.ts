/**
 * Chunk Queue
 *
 * Turns push-style sources (socket 'data' events, injected test bytes) into
 * the pull-style `read(maxBytes)` the Transport contract asks for.
 */

type QueueState = 'open' | 'ended' | 'errored'

/**
 * Pending reader - waiting for data
 */
interface PendingRead {
  maxBytes: number
  resolve: (chunk: Buffer | null) => void
  reject: (err: Error) => void
}

export interface ChunkQueue {
  /** Queue bytes for the next read */
  push(chunk: Uint8Array): void

  /** No more data; readers get `null` once the queue is drained */
  end(): void

  /** Readers get `error` once the queue is drained */
  fail(error: Error): void

  /** Resolve with at most `maxBytes` bytes, `null` at end of stream */
  read(maxBytes: number): Promise<Buffer | null>

  /** Bytes queued and not yet read */
  readonly bufferedAmount: number

  /** Whether end() or fail() was called */
  readonly finished: boolean
}

/**
 * Creates a new ChunkQueue
 */
export function createChunkQueue(): ChunkQueue {
  let state: QueueState = 'open'
  let error: Error | null = null

  const chunks: Buffer[] = []
  let bufferedAmount = 0
  const pendingReaders: PendingRead[] = []

  /**
   * Remove up to maxBytes from the head chunk
   */
  function take(head: Buffer, maxBytes: number): Buffer {
    if (head.length <= maxBytes) {
      chunks.shift()
      bufferedAmount -= head.length
      return head
    }
    chunks[0] = head.subarray(maxBytes)
    bufferedAmount -= maxBytes
    return head.subarray(0, maxBytes)
  }

  /**
   * Match pending readers with queued data, then with end/error
   */
  function flush(): void {
    while (pendingReaders.length > 0 && chunks.length > 0) {
      const reader = pendingReaders.shift()
      const head = chunks[0]
      if (!reader || !head) break
      reader.resolve(take(head, reader.maxBytes))
    }

    if (chunks.length > 0 || state === 'open') return

    while (pendingReaders.length > 0) {
      const reader = pendingReaders.shift()
      if (!reader) break
      if (error) {
        reader.reject(error)
      } else {
        reader.resolve(null)
      }
    }
  }

  return {
    push(chunk: Uint8Array): void {
      if (state !== 'open' || chunk.length === 0) return
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
      bufferedAmount += chunk.length
      flush()
    },

    end(): void {
      if (state !== 'open') return
      state = 'ended'
      flush()
    },

    fail(err: Error): void {
      if (state !== 'open') return
      state = 'errored'
      error = err
      flush()
    },

    read(maxBytes: number): Promise<Buffer | null> {
      return new Promise((resolve, reject) => {
        pendingReaders.push({ maxBytes: Math.max(1, maxBytes), resolve, reject })
        flush()
      })
    },

    get bufferedAmount(): number {
      return bufferedAmount
    },

    get finished(): boolean {
      return state !== 'open'
    },
  }
}
