import { consoleLogger, describeError } from '@relaychat/core'
import type { Logger } from '@relaychat/core'
import type { BrokerAdapter } from '../types.js'

/**
 * Structural types for the parts of the NATS API this adapter uses, so a
 * test can hand in a fake connection.
 */
export interface NatsMsgLike {
  data: Uint8Array
}

export interface NatsConnectionLike {
  publish(subject: string, data: Uint8Array): void
  subscribe(subject: string): AsyncIterable<NatsMsgLike>
  drain(): Promise<void>
}

export type NatsConnect = (opts: { servers: string }) => Promise<NatsConnectionLike>

export interface NatsAdapterOptions {
  url: string
  /** @default 'relaychat.events' */
  subject?: string
  /** Connection factory. Defaults to `connect` from the `nats` package. */
  connect?: NatsConnect
  logger?: Logger
}

async function defaultConnect(opts: { servers: string }): Promise<NatsConnectionLike> {
  // Loaded on first use so single-instance deployments never open it.
  const nats = await import('nats')
  return nats.connect(opts)
}

/**
 * NATS adapter for multi-instance deployments. Every instance subscribes to
 * the same subject; NATS core delivers each publish to all of them.
 *
 * @example
 * ```ts
 * const chat = createChatServer({
 *   tokens,
 *   storage,
 *   adapter: natsAdapter({ url: process.env.CHAT_NATS_URL ?? 'nats://localhost:4222' }),
 * })
 * ```
 */
export function natsAdapter(options: NatsAdapterOptions): BrokerAdapter {
  const {
    url,
    subject = 'relaychat.events',
    connect = defaultConnect,
    logger = consoleLogger('chat:nats'),
  } = options

  const encoder = new TextEncoder()
  const decoder = new TextDecoder()
  let connection: Promise<NatsConnectionLike> | null = null

  function getConnection(): Promise<NatsConnectionLike> {
    if (!connection) {
      connection = connect({ servers: url }).catch((err: unknown) => {
        connection = null
        throw err
      })
    }
    return connection
  }

  async function consume(
    messages: AsyncIterable<NatsMsgLike>,
    callback: (data: string) => void,
  ): Promise<void> {
    for await (const msg of messages) {
      try {
        callback(decoder.decode(msg.data))
      } catch (err) {
        logger.error('subscriber callback failed', describeError(err))
      }
    }
  }

  return {
    async publish(data: string): Promise<void> {
      const nc = await getConnection()
      nc.publish(subject, encoder.encode(data))
    },

    async subscribe(callback: (data: string) => void): Promise<void> {
      const nc = await getConnection()
      const messages = nc.subscribe(subject)
      consume(messages, callback).catch((err: unknown) => {
        logger.error('subscription ended with an error', describeError(err))
      })
    },

    async close(): Promise<void> {
      if (!connection) return
      const pending = connection
      connection = null
      const nc = await pending
      await nc.drain()
    },
  }
}
