import { WebSocketServer } from 'ws'
import type { Server } from 'http'
import { consoleLogger, describeError } from '@relaychat/core'
import type { Logger, MessageStore, RevocationSubject } from '@relaychat/core'
import type { TokenService } from '@relaychat/auth'
import { memoryAdapter } from './adapters/memory.js'
import { createBrokerBridge } from './bridge.js'
import type { BrokerRetryOptions } from './bridge.js'
import type { DedupOptions } from './dedup.js'
import { createSessionRegistry } from './registry.js'
import type { SessionRegistry } from './registry.js'
import { createDeliveryRouter } from './router.js'
import type { DeliveryRouter } from './router.js'
import { superviseConnection } from './supervisor.js'
import type { SupervisedConnection, SupervisorOptions } from './supervisor.js'
import type { BrokerAdapter, ClientTransport } from './types.js'
import { wsTransport } from './wsTransport.js'

export interface ChatServerOptions extends SupervisorOptions {
  tokens: TokenService
  storage: MessageStore
  /** Adapter for multi-instance deployments. Defaults to the in-memory adapter. */
  adapter?: BrokerAdapter
  /** WebSocket path. Defaults to `/_chat`. */
  path?: string
  retry?: BrokerRetryOptions
  dedup?: DedupOptions
  membersCacheTtlMs?: number
  now?: () => number
  logger?: Logger
}

export interface ChatServer {
  /** Resolves once the broker subscription is live. */
  readonly ready: Promise<void>
  readonly registry: SessionRegistry
  readonly router: DeliveryRouter
  /**
   * Attach the WebSocket server to a running HTTP server.
   * Call this once during application startup.
   */
  attach(server: Server): void
  /** Supervise a connection over any transport. */
  accept(transport: ClientTransport): SupervisedConnection
  /**
   * Revoke through the token service. Every instance re-validates the
   * affected connections at once instead of at its next revalidation.
   */
  revoke(subject: RevocationSubject): Promise<void>
  /** Connections not yet closed. */
  connections(): ReadonlyArray<SupervisedConnection>
  /** Close every connection with `server-shutdown`, then the socket server and broker. */
  close(): Promise<void>
}

/**
 * @example
 * const chat = createChatServer({ tokens, storage })
 * chat.attach(httpServer)
 * await chat.ready
 */
export function createChatServer(options: ChatServerOptions): ChatServer {
  const {
    tokens,
    storage,
    path = '/_chat',
    now = Date.now,
    logger = consoleLogger('chat'),
  } = options

  const adapter = options.adapter ?? memoryAdapter()
  const bridge = createBrokerBridge({ adapter, retry: options.retry, logger })
  const registry = createSessionRegistry()
  const router = createDeliveryRouter({
    storage,
    registry,
    bridge,
    dedup: options.dedup,
    membersCacheTtlMs: options.membersCacheTtlMs,
    now,
    logger,
  })

  // connectionId → connection
  const connections = new Map<string, SupervisedConnection>()
  let wss: WebSocketServer | null = null
  let idCounter = 0
  let closing = false

  function affectedBy(subject: RevocationSubject): SupervisedConnection[] {
    return Array.from(connections.values()).filter((connection) => {
      const { principal, session } = connection.state
      switch (subject.kind) {
        case 'principal':
          return principal?.id === subject.principalId
        case 'chain':
          return session?.chainId === subject.chainId
        case 'token':
          return session?.tokenId === subject.tokenId
      }
    })
  }

  function revalidateAffected(subject: RevocationSubject): void {
    for (const connection of affectedBy(subject)) {
      connection.revalidate().catch((err: unknown) => {
        logger.error('revalidation after revocation failed', {
          connectionId: connection.id,
          ...describeError(err),
        })
      })
    }
  }

  let unsubscribe: () => void = () => {}
  const ready = bridge
    .subscribe((envelope) => {
      switch (envelope.type) {
        case 'delivery':
          router.onEvent(envelope.event)
          break
        case 'receipt':
          router.onReceipt(envelope.receipt)
          break
        case 'unread':
          router.onUnread(envelope.update)
          break
        case 'revocation':
          revalidateAffected(envelope.subject)
          break
      }
    })
    .then((off) => {
      unsubscribe = off
    })
  ready.catch((err: unknown) => {
    logger.error('broker subscription failed', describeError(err))
  })

  // Revocations made through the token service on this instance, replay
  // detection included, are broadcast to every instance.
  const stopRevocations = tokens.onRevoke((subject) => {
    revalidateAffected(subject)
    bridge.publish({ type: 'revocation', subject }).catch((err: unknown) => {
      logger.warn('revocation broadcast failed', { kind: subject.kind, ...describeError(err) })
    })
  })

  function accept(transport: ClientTransport): SupervisedConnection {
    const connectionId = `${now()}-${++idCounter}`
    const connection = superviseConnection(
      connectionId,
      transport,
      { tokens, registry, router, now, logger },
      options,
    )
    if (closing) {
      void connection.close('server-shutdown')
      return connection
    }
    connections.set(connectionId, connection)
    void connection.closed.then(() => {
      connections.delete(connectionId)
    })
    return connection
  }

  return {
    ready,
    registry,
    router,

    attach(server) {
      if (wss) throw new Error('[chat] Server is already attached')
      wss = new WebSocketServer({ server, path })
      wss.on('connection', (ws) => {
        accept(wsTransport(ws))
      })
    },

    accept,

    async revoke(subject) {
      await tokens.revoke(subject)
    },

    connections() {
      return Array.from(connections.values())
    },

    async close() {
      closing = true
      stopRevocations()
      await Promise.all(
        Array.from(connections.values()).map((connection) =>
          connection.close('server-shutdown'),
        ),
      )
      connections.clear()
      const server = wss
      wss = null
      await new Promise<void>((resolve) => {
        if (server) server.close(() => resolve())
        else resolve()
      })
      unsubscribe()
      await bridge.close()
    },
  }
}
