/**
 * Engine Options
 *
 * zod schema and resolution of the options accepted by createStreamEngine().
 */

import { z } from 'zod'
import { Errors } from '../errors/factories.js'
import type { EngineOptions, StreamEncoding } from '../types/engine.js'
import { toBytes } from '../utils/bytes.js'
import { sid } from '../utils/id.js'

export const DEFAULT_READ_CHUNK_SIZE = 4096
export const DEFAULT_STOP_TIMEOUT_MS = 1000
export const DEFAULT_SEPARATOR = '\n'

export const EngineOptionsSchema = z
  .object({
    id: z.string().min(1).optional(),
    readChunkSize: z.number().int().min(1).default(DEFAULT_READ_CHUNK_SIZE),
    stopTimeoutMs: z.number().int().min(0).default(DEFAULT_STOP_TIMEOUT_MS),
    separator: z
      .union([z.string(), z.instanceof(Uint8Array)])
      .refine((value) => value.length > 0, { message: 'Separator must not be empty' })
      .default(DEFAULT_SEPARATOR),
    encoding: z.enum(['utf8', 'ascii', 'latin1', 'binary']).default('utf8'),
  })
  .strict()

/**
 * Options after defaults are applied
 */
export interface ResolvedEngineOptions {
  id: string
  readChunkSize: number
  stopTimeoutMs: number
  separator: Buffer
  encoding: StreamEncoding
}

/**
 * Validate engine options and fill in defaults.
 *
 * @throws InvalidArgumentError listing every rejected field
 */
export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const result = EngineOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.map(String).join('.') || 'root',
      message: issue.message,
      code: issue.code,
    }))
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')
    throw Errors.invalidArgument(`Invalid engine options: ${summary}`, { issues })
  }

  const { id, separator, encoding, readChunkSize, stopTimeoutMs } = result.data
  return {
    id: id ?? sid(),
    readChunkSize,
    stopTimeoutMs,
    separator: toBytes(separator, encoding),
    encoding,
  }
}
