/**
 * SSH Transport
 *
 * Connects to an SSH server, execs one command and exposes that command's
 * stdin/stdout as the byte stream. Writing to the transport feeds the
 * command, which acts as the interpreter on the remote side:
 *
 *   echo "SUBSYSTEM COMMAND" | ssh host "sh /opt/subsystem.sh"
 *
 * stderr is collected separately (see `stderrOutput()`).
 */

import type { ClientChannel, ConnectConfig } from 'ssh2'
import { z } from 'zod'
import { Errors } from '../errors/factories.js'
import type { Transport } from '../types/transport.js'
import { append, EMPTY } from '../utils/bytes.js'
import { createLogger } from '../utils/logger.js'
import { createDuplexTransport } from './duplex.js'

const logger = createLogger('ssh-transport')

export const SshTransportOptionsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(22),
  username: z.string().min(1),
  password: z.string().optional(),
  privateKey: z.union([z.string(), z.instanceof(Uint8Array)]).optional(),
  passphrase: z.string().optional(),
  /** Command whose stdin/stdout become the stream (default: 'sh') */
  command: z.string().min(1).default('sh'),
  /** Skip host key verification entirely */
  acceptAnyHostKey: z.boolean().default(false),
  readyTimeoutMs: z.number().int().min(0).default(20000),
})

/**
 * SSH transport configuration
 */
export type SshTransportOptions = z.input<typeof SshTransportOptionsSchema> & {
  /**
   * Decide whether to trust the server's host key. Without it (and without
   * `acceptAnyHostKey`) every host key is rejected.
   */
  hostVerifier?: (key: Buffer) => boolean
}

export interface SshTransport extends Transport {
  /** Drain the command's stderr output collected so far */
  stderrOutput(): Buffer
}

/**
 * Host key policy: accept everything, ask `hostVerifier`, or reject.
 */
export function createHostVerifier(
  options: Pick<SshTransportOptions, 'acceptAnyHostKey' | 'hostVerifier'>
): (key: Buffer) => boolean {
  const { acceptAnyHostKey = false, hostVerifier } = options
  return (key) => {
    if (acceptAnyHostKey) return true
    return hostVerifier ? hostVerifier(key) : false
  }
}

/**
 * Validate options and build the ssh2 connect configuration
 */
export function buildSshConnectConfig(options: SshTransportOptions): ConnectConfig {
  const result = SshTransportOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.map(String).join('.') || 'root',
      message: issue.message,
    }))
    throw Errors.invalidArgument(
      `Invalid SSH options: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      { issues }
    )
  }

  const { host, port, username, password, privateKey, passphrase, acceptAnyHostKey, readyTimeoutMs } =
    result.data

  return {
    host,
    port,
    username,
    password,
    privateKey: privateKey instanceof Uint8Array ? Buffer.from(privateKey) : privateKey,
    passphrase,
    readyTimeout: readyTimeoutMs,
    hostVerifier: createHostVerifier({ acceptAnyHostKey, hostVerifier: options.hostVerifier }),
  }
}

/**
 * Create an SSH transport. Connecting and exec'ing happen in `open()`.
 *
 * @example
 * ```typescript
 * const transport = createSshTransport({
 *   host: 'device.local',
 *   username: 'admin',
 *   password: 'test-secret',
 *   command: 'sh /opt/console.sh',
 *   acceptAnyHostKey: true,
 * })
 * const engine = await openStream(transport)
 * ```
 */
export function createSshTransport(options: SshTransportOptions): SshTransport {
  const config = buildSshConnectConfig(options)
  const command = options.command ?? 'sh'
  const name = `ssh://${config.username}@${config.host}:${config.port}`
  const log = logger.child({ transport: name })

  let stderr: Buffer = EMPTY
  let endClient: (() => void) | null = null

  const transport = createDuplexTransport({
    name,

    async connect(fail): Promise<ClientChannel> {
      // Loaded on demand so that processes which never open an SSH stream do not pay for it.
      const { default: ssh2 } = await import('ssh2')
      const client = new ssh2.Client()
      endClient = () => client.end()

      await new Promise<void>((resolve, reject) => {
        client.once('ready', () => {
          client.off('error', reject)
          resolve()
        })
        client.once('error', reject)
        client.connect(config)
      })

      client.on('error', (err: Error) => {
        log.debug({ err }, 'SSH client error')
        fail(err)
      })

      const channel = await new Promise<ClientChannel>((resolve, reject) => {
        client.exec(command, (err, stream) => {
          if (err) {
            client.end()
            reject(err)
          } else {
            resolve(stream)
          }
        })
      })

      channel.stderr.on('data', (chunk: Buffer) => {
        stderr = append(stderr, chunk)
      })
      log.debug({ command }, 'Command started')
      return channel
    },

    disconnect(): void {
      endClient?.()
      endClient = null
    },
  })

  return {
    ...transport,

    stderrOutput(): Buffer {
      const output = stderr
      stderr = EMPTY
      return output
    },
  }
}
