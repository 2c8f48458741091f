/**
 * Example 1: TCP Console
 *
 * Drives a line-oriented console over TCP.
 *
 * Usage: HOST=127.0.0.1 PORT=2323 tsx examples/01-tcp-console.ts "show version"
 */

import { createLogger, createTcpTransport, openStream, StreamTimeoutError } from '../src/index.js'

const logger = createLogger('example')

const host = process.env.HOST ?? '127.0.0.1'
const port = Number(process.env.PORT ?? 2323)
const commands = process.argv.slice(2)

const engine = await openStream(createTcpTransport({ host, port }), { stopTimeoutMs: 500 })

try {
  for (const command of commands) {
    await engine.write(`${command}\n`)
    const lines = await engine.readLines(1, {
      skip: (line) => line.toString().trim() === command,
      timeoutMs: 5000,
    })
    logger.info({ command, output: lines.map((line) => line.toString().trimEnd()) }, 'Command done')
  }
} catch (err) {
  if (!(err instanceof StreamTimeoutError)) throw err
  logger.warn({ buffered: engine.peek().toString() }, err.message)
} finally {
  await engine.stop()
}
