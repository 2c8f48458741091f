/**
 * Example 0: Loopback
 *
 * A scripted in-process peer that answers every command with a prompt.
 * Shows write/readUntil, the cursor, and what a disconnect leaves behind.
 */

import {
  createCursor,
  createLoopbackTransport,
  createLogger,
  isTransportError,
  openStream,
} from '../src/index.js'

const logger = createLogger('example')

const transport = createLoopbackTransport({
  echo: false,
  onWrite: (data, peer) => {
    const command = data.toString().trim()
    if (command === 'quit') {
      peer.inject('bye\n')
      peer.disconnect(new Error('peer hung up'))
      return
    }
    peer.inject(`${command.toUpperCase()}\n> `)
  },
})

const engine = await openStream(transport, { id: 'loopback-demo' })
const cursor = createCursor(engine)

await engine.write('hello\n')
logger.info({ reply: (await engine.readUntil('> ', 1000)).toString() }, 'Reply')

await engine.write('status\n')
await engine.readUntil('> ', 1000)
logger.info({ seen: cursor.readNew().toString() }, 'Cursor')

await engine.write('quit\n')
try {
  await engine.readUntil('> ', 1000)
} catch (err) {
  if (!isTransportError(err)) throw err
  logger.warn(
    {
      read: err.payload?.readSnapshot.toString(),
      written: err.payload?.writeSnapshot.toString(),
    },
    err.message
  )
}

await engine.stop()
