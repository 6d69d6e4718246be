/**
 * Tests for the shared wire protocol, conversation keys and error type.
 */

import { describe, it, expect } from 'vitest'
import {
  ChatError,
  MAX_PAYLOAD_LENGTH,
  brokerEnvelopeSchema,
  clientFrameSchema,
  conversationIdFor,
  decodeFrame,
  describeError,
  isAuthErrorCode,
  isChatError,
  isChatErrorCode,
  parseConversationId,
} from '@relaychat/core'

describe('conversationIdFor', () => {
  it('keys direct conversations by the sorted member pair', () => {
    expect(conversationIdFor('bob', { kind: 'direct', peerId: 'alice' })).toBe('direct:alice:bob')
    expect(conversationIdFor('alice', { kind: 'direct', peerId: 'bob' })).toBe('direct:alice:bob')
  })

  it('orders member ids by code unit, not by locale', () => {
    expect(conversationIdFor('adam', { kind: 'direct', peerId: 'Zed' })).toBe('direct:Zed:adam')
    expect(conversationIdFor('Zed', { kind: 'direct', peerId: 'adam' })).toBe('direct:Zed:adam')
    // Canonically equivalent spellings stay distinct and keep one order.
    const composed = '\u00e9'
    const decomposed = 'e\u0301'
    expect(conversationIdFor(composed, { kind: 'direct', peerId: decomposed })).toBe(
      `direct:${decomposed}:${composed}`,
    )
    expect(conversationIdFor(decomposed, { kind: 'direct', peerId: composed })).toBe(
      `direct:${decomposed}:${composed}`,
    )
  })

  it('keys group conversations by group id', () => {
    expect(conversationIdFor('alice', { kind: 'group', groupId: 'team' })).toBe('group:team')
  })
})

describe('parseConversationId', () => {
  it('parses both kinds', () => {
    expect(parseConversationId('direct:alice:bob')).toEqual({
      kind: 'direct',
      members: ['alice', 'bob'],
    })
    expect(parseConversationId('group:team')).toEqual({ kind: 'group', groupId: 'team' })
  })

  it('returns null for malformed ids', () => {
    expect(parseConversationId('direct:alice')).toBeNull()
    expect(parseConversationId('group:')).toBeNull()
    expect(parseConversationId('channel:x')).toBeNull()
  })
})

describe('decodeFrame', () => {
  it('parses a valid client frame', () => {
    const frame = decodeFrame(
      clientFrameSchema,
      JSON.stringify({
        type: 'send',
        requestId: 'r1',
        target: { kind: 'group', groupId: 'team' },
        payload: 'hi',
      }),
    )
    expect(frame).toEqual({
      type: 'send',
      requestId: 'r1',
      target: { kind: 'group', groupId: 'team' },
      payload: 'hi',
    })
  })

  it('returns null for invalid JSON', () => {
    expect(decodeFrame(clientFrameSchema, '{not json')).toBeNull()
  })

  it('returns null for unknown frame types', () => {
    expect(decodeFrame(clientFrameSchema, JSON.stringify({ type: 'subscribe' }))).toBeNull()
  })

  it('rejects payloads over the size limit', () => {
    const frame = {
      type: 'send',
      requestId: 'r1',
      target: { kind: 'direct', peerId: 'bob' },
      payload: 'x'.repeat(MAX_PAYLOAD_LENGTH + 1),
    }
    expect(decodeFrame(clientFrameSchema, JSON.stringify(frame))).toBeNull()
  })

  it('validates broker envelopes', () => {
    const envelope = { type: 'revocation', subject: { kind: 'chain', chainId: 'c1' } }
    expect(decodeFrame(brokerEnvelopeSchema, JSON.stringify(envelope))).toEqual(envelope)
    expect(
      decodeFrame(brokerEnvelopeSchema, JSON.stringify({ type: 'revocation', subject: {} })),
    ).toBeNull()
  })
})

describe('ChatError', () => {
  it('carries its code and a prefixed message', () => {
    const cause = new Error('boom')
    const err = new ChatError('PersistenceFailure', 'Write failed', { cause })
    expect(err.code).toBe('PersistenceFailure')
    expect(err.message).toBe('[chat] Write failed')
    expect(err.cause).toBe(cause)
    expect(err).toBeInstanceOf(Error)
  })

  it('isChatError narrows by code', () => {
    const err = new ChatError('NotAMember', 'nope')
    expect(isChatError(err)).toBe(true)
    expect(isChatError(err, 'NotAMember')).toBe(true)
    expect(isChatError(err, 'AuthExpired')).toBe(false)
    expect(isChatError(new Error('plain'))).toBe(false)
  })

  it('classifies codes', () => {
    expect(isChatErrorCode('TokenReplay')).toBe(true)
    expect(isChatErrorCode('Internal')).toBe(false)
    expect(isAuthErrorCode('AuthRevoked')).toBe(true)
    expect(isAuthErrorCode('PublishFailure')).toBe(false)
  })

  it('describeError includes the code of coded errors', () => {
    expect(describeError(new ChatError('AuthExpired', 'late'))).toEqual({
      error: '[chat] late',
      code: 'AuthExpired',
    })
    expect(describeError('text')).toEqual({ error: 'text' })
  })
})
