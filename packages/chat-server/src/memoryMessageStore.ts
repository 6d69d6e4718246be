import { randomUUID } from 'crypto'
import { ChatError, parseConversationId } from '@relaychat/core'
import type {
  ConversationId,
  MessageStore,
  PersistedChange,
  PrincipalId,
} from '@relaychat/core'

export interface StoredMessage {
  readonly messageId: string
  readonly conversationId: ConversationId
  readonly senderId: PrincipalId
  readonly payload: string | null
  /** Sequence of the latest change to this message. */
  readonly sequence: number
  /** Sequence the message was created with. */
  readonly createdSequence: number
  readonly createdAt: number
  readonly editedAt: number | null
  readonly deleted: boolean
}

export interface MemoryMessageStoreOptions {
  /** Principals that may hold direct conversations with each other. */
  principals?: Iterable<PrincipalId>
  /** Group id → member ids. */
  groups?: Record<string, Iterable<PrincipalId>>
  now?: () => number
}

export interface MemoryMessageStore extends MessageStore {
  addPrincipal(principalId: PrincipalId): void
  setGroupMembers(groupId: string, members: Iterable<PrincipalId>): void
  /** Messages of a conversation in sequence order, deleted ones included. */
  history(conversationId: ConversationId): ReadonlyArray<StoredMessage>
  /** Highest sequence `readerId` has marked read, or `0`. */
  readMarker(conversationId: ConversationId, readerId: PrincipalId): number
}

/**
 * In-process {@link MessageStore} for development and tests.
 *
 * A direct conversation exists when both participants are known principals;
 * a group conversation exists once its members are set. Every write takes
 * the next sequence number of its conversation, edits and deletes included.
 */
export function createMemoryMessageStore(
  options: MemoryMessageStoreOptions = {},
): MemoryMessageStore {
  const { now = Date.now } = options
  const principals = new Set<PrincipalId>(options.principals)
  const groups = new Map<string, Set<PrincipalId>>()
  const messages = new Map<string, StoredMessage>()
  const sequences = new Map<ConversationId, number>()
  // conversation id → reader id → sequence
  const readMarkers = new Map<ConversationId, Map<PrincipalId, number>>()

  for (const [groupId, members] of Object.entries(options.groups ?? {})) {
    groups.set(groupId, new Set(members))
  }

  function nextSequence(conversationId: ConversationId): number {
    const sequence = (sequences.get(conversationId) ?? 0) + 1
    sequences.set(conversationId, sequence)
    return sequence
  }

  function ownMessage(messageId: string, authorId: PrincipalId): StoredMessage {
    const message = messages.get(messageId)
    if (!message || message.deleted || message.senderId !== authorId) {
      throw new ChatError('MessageNotFound', `Message "${messageId}" not found`)
    }
    return message
  }

  function change(message: StoredMessage): PersistedChange {
    return {
      messageId: message.messageId,
      conversationId: message.conversationId,
      sequence: message.sequence,
      persistedAt: message.editedAt ?? message.createdAt,
    }
  }

  return {
    async membersOf(conversationId) {
      const parsed = parseConversationId(conversationId)
      if (!parsed) return null
      if (parsed.kind === 'group') {
        const members = groups.get(parsed.groupId)
        return members ? new Set(members) : null
      }
      const [a, b] = parsed.members
      return principals.has(a) && principals.has(b) ? new Set([a, b]) : null
    },

    async persistMessage(conversationId, senderId, payload) {
      const sequence = nextSequence(conversationId)
      const message: StoredMessage = {
        messageId: randomUUID(),
        conversationId,
        senderId,
        payload,
        sequence,
        createdSequence: sequence,
        createdAt: now(),
        editedAt: null,
        deleted: false,
      }
      messages.set(message.messageId, message)
      return change(message)
    },

    async editMessage(messageId, editorId, payload) {
      const previous = ownMessage(messageId, editorId)
      const message: StoredMessage = {
        ...previous,
        payload,
        sequence: nextSequence(previous.conversationId),
        editedAt: now(),
      }
      messages.set(messageId, message)
      return change(message)
    },

    async deleteMessage(messageId, deleterId) {
      const previous = ownMessage(messageId, deleterId)
      const message: StoredMessage = {
        ...previous,
        payload: null,
        sequence: nextSequence(previous.conversationId),
        editedAt: now(),
        deleted: true,
      }
      messages.set(messageId, message)
      return change(message)
    },

    async markRead(conversationId, readerId, sequence) {
      let markers = readMarkers.get(conversationId)
      if (!markers) {
        markers = new Map()
        readMarkers.set(conversationId, markers)
      }
      const latest = sequences.get(conversationId) ?? 0
      const previous = markers.get(readerId) ?? 0
      const next = Math.max(previous, Math.min(sequence, latest))
      markers.set(readerId, next)
      return { previous, sequence: next }
    },

    async unreadCount(conversationId, principalId) {
      const marker = readMarkers.get(conversationId)?.get(principalId) ?? 0
      let count = 0
      for (const message of messages.values()) {
        if (
          message.conversationId === conversationId &&
          !message.deleted &&
          message.senderId !== principalId &&
          message.createdSequence > marker
        ) {
          count++
        }
      }
      return count
    },

    addPrincipal(principalId) {
      principals.add(principalId)
    },

    setGroupMembers(groupId, members) {
      groups.set(groupId, new Set(members))
    },

    history(conversationId) {
      return Array.from(messages.values())
        .filter((message) => message.conversationId === conversationId)
        .sort((a, b) => a.sequence - b.sequence)
    },

    readMarker(conversationId, readerId) {
      return readMarkers.get(conversationId)?.get(readerId) ?? 0
    },
  }
}
