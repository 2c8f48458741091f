/**
 * Cursor Types
 */

/**
 * Incremental reader over a shared engine's read buffer
 */
export interface StreamCursor {
  /** Bytes of the read buffer not yet delivered to this cursor. Never consumes. */
  readNew(): Buffer

  /** Position in the engine's current read buffer */
  readonly offset: number

  /** Deliver the whole buffer again on the next readNew() */
  rewind(): void

  /** Mark everything currently buffered as delivered */
  skipToEnd(): void
}
