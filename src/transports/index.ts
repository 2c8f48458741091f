export { createChunkQueue, type ChunkQueue } from './chunk-queue.js'
export { createDuplexTransport, type DuplexTransportHooks } from './duplex.js'
export { createTcpTransport, type TcpTransportOptions } from './tcp.js'
export {
  createSshTransport,
  buildSshConnectConfig,
  createHostVerifier,
  SshTransportOptionsSchema,
  type SshTransport,
  type SshTransportOptions,
} from './ssh.js'
export {
  createLoopbackTransport,
  type LoopbackTransport,
  type LoopbackTransportOptions,
  type LoopbackPeer,
} from './loopback.js'
