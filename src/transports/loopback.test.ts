import { describe, it, expect } from 'vitest'
import { createLoopbackTransport } from './loopback.js'

describe('LoopbackTransport', () => {
  it('should echo writes by default', async () => {
    const transport = createLoopbackTransport()
    await transport.open()

    await transport.write(Buffer.from('ping'))

    expect((await transport.read(64))?.toString()).toBe('ping')
    expect(transport.written().toString()).toBe('ping')
  })

  it('should deliver injected bytes', async () => {
    const transport = createLoopbackTransport({ echo: false })
    await transport.open()

    transport.inject('from peer')
    await transport.write(Buffer.from('to peer'))

    expect((await transport.read(64))?.toString()).toBe('from peer')
    expect(transport.written().toString()).toBe('to peer')
  })

  it('should let onWrite answer as the peer', async () => {
    const transport = createLoopbackTransport({
      echo: false,
      onWrite: (data, peer) => peer.inject(`ack:${data.toString()}`),
    })
    await transport.open()

    await transport.write(Buffer.from('1'))

    expect((await transport.read(64))?.toString()).toBe('ack:1')
  })

  it('should fail a write when onWrite throws', async () => {
    const transport = createLoopbackTransport({
      onWrite: () => {
        throw new Error('refused')
      },
    })
    await transport.open()

    await expect(transport.write(Buffer.from('x'))).rejects.toThrow('refused')
    expect(transport.written().length).toBe(0)
  })

  it('should reject writes before open and after close', async () => {
    const transport = createLoopbackTransport()
    await expect(transport.write(Buffer.from('x'))).rejects.toThrow('not writable')

    await transport.open()
    await transport.close()

    expect(transport.closed).toBe(true)
    await expect(transport.write(Buffer.from('x'))).rejects.toThrow('not writable')
    await expect(transport.open()).rejects.toThrow('closed')
  })

  it('should unblock a pending read on close', async () => {
    const transport = createLoopbackTransport()
    await transport.open()
    const pending = transport.read(64)

    await transport.close()

    expect(await pending).toBeNull()
  })

  it('should fail reads on disconnect', async () => {
    const transport = createLoopbackTransport()
    await transport.open()
    const pending = transport.read(64)

    transport.disconnect(new Error('cable pulled'))

    await expect(pending).rejects.toThrow('cable pulled')
  })
})
