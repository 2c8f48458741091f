/**
 * Transport Types
 *
 * The byte source/sink contract the engine depends on. Adapters for TCP,
 * SSH and in-process streams each implement it independently.
 */

/**
 * Transport capability
 */
export interface Transport {
  /** Connect / acquire the underlying handle. Called once by `engine.start()`. */
  open(): Promise<void>

  /**
   * Read at most `maxBytes` bytes.
   *
   * Resolves once bytes are available, with `null` at end of stream, and
   * rejects on I/O failure. After `close()` a pending read must settle promptly.
   */
  read(maxBytes: number): Promise<Uint8Array | null>

  /** Hand bytes to the underlying handle */
  write(data: Uint8Array): Promise<void>

  /** Release the handle. Idempotent; unblocks any in-flight `read`. */
  close(): Promise<void>
}
