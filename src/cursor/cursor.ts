/**
 * Stream Cursor
 *
 * "What's new since my last look" over a shared engine. A cursor never
 * consumes from the engine; any number of cursors can follow the same buffer.
 *
 * `readUntil()` and `consumeBuffer()` on the engine remove bytes from the
 * front of the buffer underneath every cursor. The cursor compares the
 * engine's `drainedBytes` with the value it saw last time and moves its
 * offset back by the difference, clamped into [0, bufferedLength]. After a
 * drain the next `readNew()` therefore returns only bytes that arrived
 * after it.
 */

import type { StreamCursor } from '../types/cursor.js'
import type { StreamEngine } from '../types/engine.js'

/**
 * Create a cursor positioned at the start of the engine's current buffer
 *
 * @example
 * ```typescript
 * const cursor = createCursor(engine)
 * await engine.write('ls\n')
 * const fresh = cursor.readNew()  // everything since the cursor was created
 * ```
 */
export function createCursor(engine: StreamEngine): StreamCursor {
  let offset = 0
  let drainedSeen = engine.drainedBytes

  /**
   * Shift the offset by whatever was drained since the last call
   */
  function sync(): void {
    const drained = engine.drainedBytes
    offset -= drained - drainedSeen
    drainedSeen = drained
    offset = Math.min(Math.max(offset, 0), engine.bufferedLength)
  }

  return {
    readNew(): Buffer {
      sync()
      const chunk = engine.peek(offset)
      offset += chunk.length
      return chunk
    },

    get offset(): number {
      sync()
      return offset
    },

    rewind(): void {
      sync()
      offset = 0
    },

    skipToEnd(): void {
      sync()
      offset = engine.bufferedLength
    },
  }
}
