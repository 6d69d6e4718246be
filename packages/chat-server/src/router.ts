import { randomUUID } from 'crypto'
import {
  ChatError,
  consoleLogger,
  conversationIdFor,
  createTtlCache,
  describeError,
  isChatError,
} from '@relaychat/core'
import type {
  BrokerEnvelope,
  ConversationId,
  ConversationTarget,
  DeliveryEvent,
  DeliveryKind,
  DeliveryStatus,
  Logger,
  MessageStore,
  PersistedChange,
  Principal,
  PrincipalId,
  ReadMarkerChange,
  ReadReceipt,
  ServerFrame,
  UnreadCount,
  UnreadUpdate,
} from '@relaychat/core'
import { createDedup } from './dedup.js'
import type { DedupOptions } from './dedup.js'
import type { BrokerBridge } from './bridge.js'
import type { SessionRegistry } from './registry.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DeliveryRouterOptions {
  storage: MessageStore
  registry: SessionRegistry
  bridge: BrokerBridge
  dedup?: DedupOptions
  /**
   * How long a conversation's member set is reused, in milliseconds.
   * @default 30000
   */
  membersCacheTtlMs?: number
  /** Clock source in milliseconds. Defaults to `Date.now`. */
  now?: () => number
  logger?: Logger
}

export interface DeliveryResult {
  event: DeliveryEvent
  /**
   * `degraded` when the change was persisted and delivered locally but the
   * broker publish failed; recipients on other instances see it on their
   * next history fetch.
   */
  delivery: DeliveryStatus
}

export interface ReceiptResult {
  /** Carries the stored marker, which may differ from the requested one. */
  receipt: ReadReceipt
  /** `false` when the marker did not move; nothing was fanned out then. */
  advanced: boolean
  delivery: DeliveryStatus
}

export interface DeliveryRouter {
  /**
   * Persist a new message and fan it out. Fails with `ConversationNotFound`,
   * `NotAMember` or `PersistenceFailure`; nothing is published on failure.
   */
  send(sender: Principal, target: ConversationTarget, payload: string): Promise<DeliveryResult>
  /** Replace the payload of one of the sender's messages. */
  edit(sender: Principal, messageId: string, payload: string): Promise<DeliveryResult>
  /** Delete one of the sender's messages. */
  remove(sender: Principal, messageId: string): Promise<DeliveryResult>
  /**
   * Record a read marker. When it moves, fan out the receipt to every member
   * and the reader's new unread count to the reader.
   */
  markRead(
    reader: Principal,
    conversationId: ConversationId,
    sequence: number,
  ): Promise<ReceiptResult>
  /** Deliver an event received from the broker to local connections. Never throws. */
  onEvent(event: DeliveryEvent): void
  /** Deliver a receipt received from the broker to local connections. Never throws. */
  onReceipt(receipt: ReadReceipt): void
  /** Deliver unread counts received from the broker to local connections. Never throws. */
  onUnread(update: UnreadUpdate): void
  /** Forget the cached member set after a membership change. */
  invalidateMembers(conversationId: ConversationId): void
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Routes persisted changes to every live connection of every recipient,
 * on this instance directly and on the others through the broker.
 *
 * An event is marked as seen before it is pushed locally, so its broker
 * echo back to this instance is dropped and no connection gets it twice.
 */
export function createDeliveryRouter(options: DeliveryRouterOptions): DeliveryRouter {
  const {
    storage,
    registry,
    bridge,
    membersCacheTtlMs = 30_000,
    now = Date.now,
    logger = consoleLogger('chat:router'),
  } = options

  const dedup = createDedup({ now, ...options.dedup })
  const members = createTtlCache<ReadonlySet<PrincipalId>>({ ttl: membersCacheTtlMs, now })

  async function membersOf(conversationId: ConversationId): Promise<ReadonlySet<PrincipalId>> {
    let found: ReadonlySet<PrincipalId> | null
    try {
      found = await members.getOrLoad(conversationId, () => storage.membersOf(conversationId))
    } catch (err) {
      throw asPersistenceFailure(err)
    }
    if (!found) {
      throw new ChatError('ConversationNotFound', `Conversation "${conversationId}" does not exist`)
    }
    return found
  }

  async function requireMember(
    principalId: PrincipalId,
    conversationId: ConversationId,
  ): Promise<ReadonlySet<PrincipalId>> {
    const found = await membersOf(conversationId)
    if (!found.has(principalId)) {
      throw new ChatError('NotAMember', `Not a member of "${conversationId}"`)
    }
    return found
  }

  async function persist(write: () => Promise<PersistedChange>): Promise<PersistedChange> {
    try {
      return await write()
    } catch (err) {
      throw asPersistenceFailure(err)
    }
  }

  function pushTo(recipients: ReadonlyArray<PrincipalId>, frame: ServerFrame): number {
    let pushed = 0
    for (const recipientId of recipients) {
      for (const connection of registry.connectionsFor(recipientId)) {
        try {
          if (connection.push(frame)) pushed++
        } catch (err) {
          logger.error('push to connection failed', {
            connectionId: connection.id,
            ...describeError(err),
          })
        }
      }
    }
    return pushed
  }

  function pushEvent(event: DeliveryEvent): void {
    const pushed = pushTo(event.recipients, { type: 'event', event })
    logger.debug('event delivered locally', {
      eventId: event.eventId,
      conversationId: event.conversationId,
      connections: pushed,
    })
  }

  function pushUnread(update: UnreadUpdate): void {
    for (const { principalId, count } of update.counts) {
      pushTo([principalId], { type: 'unread', conversationId: update.conversationId, count })
    }
  }

  // Counts are a notification on top of a persisted change: a failed lookup
  // is logged and the change still succeeds.
  async function notifyUnread(
    conversationId: ConversationId,
    principalIds: ReadonlyArray<PrincipalId>,
  ): Promise<void> {
    if (principalIds.length === 0) return
    let counts: UnreadCount[]
    try {
      counts = await Promise.all(
        principalIds.map(async (principalId) => ({
          principalId,
          count: await storage.unreadCount(conversationId, principalId),
        })),
      )
    } catch (err) {
      logger.warn('unread count lookup failed', { conversationId, ...describeError(err) })
      return
    }
    const update: UnreadUpdate = { eventId: randomUUID(), conversationId, counts }
    dedup.seen(conversationId, update.eventId)
    pushUnread(update)
    await publish({ type: 'unread', update }, conversationId)
  }

  async function publish(
    envelope: BrokerEnvelope,
    conversationId: ConversationId,
  ): Promise<DeliveryStatus> {
    try {
      await bridge.publish(envelope)
      return 'delivered'
    } catch (err) {
      logger.warn('cross-instance fan-out degraded', {
        type: envelope.type,
        conversationId,
        ...describeError(err),
      })
      return 'degraded'
    }
  }

  async function fanOut(
    kind: DeliveryKind,
    sender: Principal,
    change: PersistedChange,
    payload: string | null,
    recipients: ReadonlySet<PrincipalId>,
  ): Promise<DeliveryResult> {
    const event: DeliveryEvent = {
      eventId: randomUUID(),
      kind,
      messageId: change.messageId,
      conversationId: change.conversationId,
      senderId: sender.id,
      sequence: change.sequence,
      payload,
      recipients: Array.from(recipients),
      persistedAt: change.persistedAt,
    }
    dedup.seen(event.conversationId, event.eventId)
    pushEvent(event)
    const delivery = await publish({ type: 'delivery', event }, event.conversationId)
    return { event, delivery }
  }

  // The author may have left the conversation since writing the message;
  // the change is fanned out to the current members either way.
  async function currentMembers(
    change: PersistedChange,
    authorId: PrincipalId,
  ): Promise<ReadonlySet<PrincipalId>> {
    try {
      return await membersOf(change.conversationId)
    } catch (err) {
      logger.warn('member lookup failed after persisting a change', {
        conversationId: change.conversationId,
        ...describeError(err),
      })
      return new Set([authorId])
    }
  }

  return {
    async send(sender, target, payload) {
      const conversationId = conversationIdFor(sender.id, target)
      const recipients = await requireMember(sender.id, conversationId)
      const change = await persist(() =>
        storage.persistMessage(conversationId, sender.id, payload),
      )
      const result = await fanOut('created', sender, change, payload, recipients)
      await notifyUnread(conversationId, othersThan(sender.id, recipients))
      return result
    },

    async edit(sender, messageId, payload) {
      const change = await persist(() => storage.editMessage(messageId, sender.id, payload))
      const recipients = await currentMembers(change, sender.id)
      return fanOut('edited', sender, change, payload, recipients)
    },

    async remove(sender, messageId) {
      const change = await persist(() => storage.deleteMessage(messageId, sender.id))
      const recipients = await currentMembers(change, sender.id)
      const result = await fanOut('deleted', sender, change, null, recipients)
      await notifyUnread(change.conversationId, othersThan(sender.id, recipients))
      return result
    },

    async markRead(reader, conversationId, sequence) {
      const recipients = await requireMember(reader.id, conversationId)
      let marker: ReadMarkerChange
      try {
        marker = await storage.markRead(conversationId, reader.id, sequence)
      } catch (err) {
        throw asPersistenceFailure(err)
      }
      const receipt: ReadReceipt = {
        eventId: randomUUID(),
        conversationId,
        readerId: reader.id,
        sequence: marker.sequence,
        recipients: Array.from(recipients),
        readAt: now(),
      }
      if (marker.sequence === marker.previous) {
        return { receipt, advanced: false, delivery: 'delivered' }
      }
      dedup.seen(conversationId, receipt.eventId)
      pushTo(receipt.recipients, { type: 'receipt', receipt })
      const delivery = await publish({ type: 'receipt', receipt }, conversationId)
      await notifyUnread(conversationId, [reader.id])
      return { receipt, advanced: true, delivery }
    },

    onEvent(event) {
      if (dedup.seen(event.conversationId, event.eventId)) return
      pushEvent(event)
    },

    onReceipt(receipt) {
      if (dedup.seen(receipt.conversationId, receipt.eventId)) return
      pushTo(receipt.recipients, { type: 'receipt', receipt })
    },

    onUnread(update) {
      if (dedup.seen(update.conversationId, update.eventId)) return
      pushUnread(update)
    },

    invalidateMembers(conversationId) {
      members.delete(conversationId)
    },
  }
}

function othersThan(
  principalId: PrincipalId,
  members: ReadonlySet<PrincipalId>,
): PrincipalId[] {
  return Array.from(members).filter((member) => member !== principalId)
}

// Storage errors that already carry a chat code (MessageNotFound) pass through.
function asPersistenceFailure(err: unknown): ChatError {
  if (isChatError(err)) return err
  return new ChatError('PersistenceFailure', 'Message store request failed', { cause: err })
}
