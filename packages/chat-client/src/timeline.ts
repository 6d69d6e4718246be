import { Store } from '@tanstack/store'
import type { ConversationId, DeliveryEvent, PrincipalId } from '@relaychat/core'

export interface TimelineEntry {
  readonly messageId: string
  readonly senderId: PrincipalId
  /** `null` once deleted. */
  readonly payload: string | null
  /** Sequence of the message's creation; entries are ordered by it. */
  readonly position: number
  /** Sequence of the latest change applied to this message. */
  readonly sequence: number
  readonly edited: boolean
  readonly deleted: boolean
  readonly updatedAt: number
}

export interface TimelineState {
  readonly entries: ReadonlyArray<TimelineEntry>
  /** Highest sequence applied so far. */
  readonly lastSequence: number
}

export interface Timeline {
  readonly conversationId: ConversationId
  readonly store: Store<TimelineState>
  /**
   * Apply a delivery event. Returns `false` when it was ignored: another
   * conversation, a sequence already applied, or a change older than what
   * the entry already shows.
   */
  apply(event: DeliveryEvent): boolean
  entries(): ReadonlyArray<TimelineEntry>
}

/**
 * Client-side view of one conversation, ordered by storage sequence rather
 * than arrival. Events may arrive in any order and more than once; every
 * sequence number is applied at most once.
 */
export function createTimeline(conversationId: ConversationId): Timeline {
  const store = new Store<TimelineState>({ entries: [], lastSequence: 0 })
  const applied = new Set<number>()
  const byMessage = new Map<string, TimelineEntry>()

  function publish(sequence: number): void {
    const entries = Array.from(byMessage.values()).sort((a, b) => a.position - b.position)
    const lastSequence = Math.max(store.state.lastSequence, sequence)
    store.setState(() => ({ entries, lastSequence }))
  }

  return {
    conversationId,
    store,

    apply(event) {
      if (event.conversationId !== conversationId) return false
      if (applied.has(event.sequence)) return false
      applied.add(event.sequence)

      const existing = byMessage.get(event.messageId)
      if (!existing) {
        // A later edit or delete may arrive before the creation; it holds the
        // slot at its own sequence until the creation shows up.
        byMessage.set(event.messageId, {
          messageId: event.messageId,
          senderId: event.senderId,
          payload: event.payload,
          position: event.sequence,
          sequence: event.sequence,
          edited: event.kind === 'edited',
          deleted: event.kind === 'deleted',
          updatedAt: event.persistedAt,
        })
        publish(event.sequence)
        return true
      }

      const position =
        event.kind === 'created' ? event.sequence : Math.min(existing.position, event.sequence)
      if (event.sequence < existing.sequence) {
        // Stale content; only the slot can move.
        if (position !== existing.position) {
          byMessage.set(event.messageId, { ...existing, position })
          publish(event.sequence)
        }
        return position !== existing.position
      }

      byMessage.set(event.messageId, {
        ...existing,
        payload: event.payload,
        position,
        sequence: event.sequence,
        edited: existing.edited || event.kind === 'edited',
        deleted: existing.deleted || event.kind === 'deleted',
        updatedAt: event.persistedAt,
      })
      publish(event.sequence)
      return true
    },

    entries() {
      return store.state.entries
    },
  }
}
