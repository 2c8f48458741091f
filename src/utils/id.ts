/**
 * Short ID generator for engine and connection IDs.
 */

import { randomFillSync } from 'node:crypto'

/** 64 URL-safe characters, 6 bits each */
const URL_SAFE = 'useandom-26T198340PX75pxJACKVERYMINDBUSHWOLF_GQZbfghjklqvwyzrict'

const DEFAULT_SIZE = 12

/**
 * Generate a short URL-safe ID.
 *
 * @example
 * ```typescript
 * const id = sid()    // 'V1StGXR8_Z5j'
 * const short = sid(6)
 * ```
 */
export function sid(size: number = DEFAULT_SIZE): string {
  const bytes = new Uint8Array(size)
  randomFillSync(bytes)

  let id = ''
  for (const byte of bytes) {
    id += URL_SAFE.charAt(byte & 63)
  }
  return id
}
