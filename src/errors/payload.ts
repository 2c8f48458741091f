/**
 * Error Payload
 *
 * Snapshot of the engine's read buffer and write history taken at the moment
 * the reader hit a fatal transport failure.
 */

/**
 * Immutable `(readSnapshot, writeSnapshot)` pair.
 *
 * Both accessors hand out copies, so nothing a caller does to the returned
 * bytes reaches the stored snapshot.
 */
export class ErrorPayload {
  readonly #read: Buffer
  readonly #write: Buffer

  /** @internal Built by the engine's reader path only. */
  constructor(read: Uint8Array, write: Uint8Array) {
    this.#read = Buffer.from(read)
    this.#write = Buffer.from(write)
    Object.freeze(this)
  }

  /** Bytes received and not yet consumed when the failure happened */
  get readSnapshot(): Buffer {
    return Buffer.from(this.#read)
  }

  /** Every byte successfully written before the failure */
  get writeSnapshot(): Buffer {
    return Buffer.from(this.#write)
  }

  get readLength(): number {
    return this.#read.length
  }

  get writeLength(): number {
    return this.#write.length
  }

  /**
   * Convert to plain object for logging and serialization
   */
  toJSON(): { read: string; write: string; readLength: number; writeLength: number } {
    return {
      read: this.#read.toString('utf8'),
      write: this.#write.toString('utf8'),
      readLength: this.#read.length,
      writeLength: this.#write.length,
    }
  }
}
