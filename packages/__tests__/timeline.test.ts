import { describe, it, expect } from 'vitest'
import { createTimeline } from '@relaychat/client'
import type { DeliveryEvent, DeliveryKind } from '@relaychat/core'

const CONVERSATION = 'direct:alice:bob'

function event(
  kind: DeliveryKind,
  messageId: string,
  sequence: number,
  payload: string | null,
): DeliveryEvent {
  return {
    eventId: `evt-${sequence}`,
    kind,
    messageId,
    conversationId: CONVERSATION,
    senderId: 'alice',
    sequence,
    payload,
    recipients: ['alice', 'bob'],
    persistedAt: sequence * 1000,
  }
}

describe('createTimeline', () => {
  it('orders messages by sequence, not arrival', () => {
    const timeline = createTimeline(CONVERSATION)
    timeline.apply(event('created', 'm2', 2, 'second'))
    timeline.apply(event('created', 'm1', 1, 'first'))

    expect(timeline.entries().map((entry) => entry.payload)).toEqual(['first', 'second'])
    expect(timeline.store.state.lastSequence).toBe(2)
  })

  it('applies each sequence once', () => {
    const timeline = createTimeline(CONVERSATION)
    expect(timeline.apply(event('created', 'm1', 1, 'hi'))).toBe(true)
    expect(timeline.apply(event('created', 'm1', 1, 'hi'))).toBe(false)
    expect(timeline.entries()).toHaveLength(1)
  })

  it('ignores events of other conversations', () => {
    const timeline = createTimeline(CONVERSATION)
    const other = { ...event('created', 'm1', 1, 'hi'), conversationId: 'group:team' }
    expect(timeline.apply(other)).toBe(false)
    expect(timeline.entries()).toEqual([])
  })

  it('applies edits and deletions in place', () => {
    const timeline = createTimeline(CONVERSATION)
    timeline.apply(event('created', 'm1', 1, 'helo'))
    timeline.apply(event('created', 'm2', 2, 'other'))
    timeline.apply(event('edited', 'm1', 3, 'hello'))
    timeline.apply(event('deleted', 'm2', 4, null))

    expect(timeline.entries()).toEqual([
      {
        messageId: 'm1',
        senderId: 'alice',
        payload: 'hello',
        position: 1,
        sequence: 3,
        edited: true,
        deleted: false,
        updatedAt: 3000,
      },
      {
        messageId: 'm2',
        senderId: 'alice',
        payload: null,
        position: 2,
        sequence: 4,
        edited: false,
        deleted: true,
        updatedAt: 4000,
      },
    ])
  })

  it('keeps newer content when an older edit arrives late', () => {
    const timeline = createTimeline(CONVERSATION)
    timeline.apply(event('created', 'm1', 1, 'v1'))
    timeline.apply(event('edited', 'm1', 3, 'v3'))

    expect(timeline.apply(event('edited', 'm1', 2, 'v2'))).toBe(false)
    expect(timeline.entries()[0]?.payload).toBe('v3')
  })

  it('moves an edit that arrived first into the creation slot', () => {
    const timeline = createTimeline(CONVERSATION)
    timeline.apply(event('created', 'm2', 2, 'between'))
    timeline.apply(event('edited', 'm1', 3, 'v2'))
    expect(timeline.entries().map((entry) => entry.messageId)).toEqual(['m2', 'm1'])

    expect(timeline.apply(event('created', 'm1', 1, 'v1'))).toBe(true)

    expect(timeline.entries().map((entry) => entry.messageId)).toEqual(['m1', 'm2'])
    expect(timeline.entries()[0]).toMatchObject({ payload: 'v2', position: 1, sequence: 3 })
  })
})
