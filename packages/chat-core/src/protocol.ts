import { z } from 'zod'
import type {
  BrokerEnvelope,
  DeliveryEvent,
  Principal,
  ReadReceipt,
  RevocationSubject,
  UnreadUpdate,
} from './types.js'

// ---------------------------------------------------------------------------
// Wire protocol shared by client, server and broker.
// Defined once in core so every side parses the same shapes.
// ---------------------------------------------------------------------------

/** Longest message payload accepted from a client, in UTF-16 code units. */
export const MAX_PAYLOAD_LENGTH = 16_384

const id = z.string().min(1).max(256)
const sequence = z.number().int().nonnegative()
const payload = z.string().max(MAX_PAYLOAD_LENGTH)

export const principalSchema: z.ZodType<Principal> = z.object({
  id,
  displayName: z.string(),
  groups: z.array(z.string()),
})

export const deliveryEventSchema: z.ZodType<DeliveryEvent> = z.object({
  eventId: id,
  kind: z.enum(['created', 'edited', 'deleted']),
  messageId: id,
  conversationId: id,
  senderId: id,
  sequence,
  payload: z.string().nullable(),
  recipients: z.array(id),
  persistedAt: z.number(),
})

export const readReceiptSchema: z.ZodType<ReadReceipt> = z.object({
  eventId: id,
  conversationId: id,
  readerId: id,
  sequence,
  recipients: z.array(id),
  readAt: z.number(),
})

export const unreadUpdateSchema: z.ZodType<UnreadUpdate> = z.object({
  eventId: id,
  conversationId: id,
  counts: z.array(z.object({ principalId: id, count: sequence })),
})

export const revocationSubjectSchema: z.ZodType<RevocationSubject> =
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('principal'), principalId: id }),
    z.object({ kind: z.literal('chain'), chainId: id }),
    z.object({ kind: z.literal('token'), tokenId: id }),
  ])

export const brokerEnvelopeSchema: z.ZodType<BrokerEnvelope> =
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('delivery'), event: deliveryEventSchema }),
    z.object({ type: z.literal('receipt'), receipt: readReceiptSchema }),
    z.object({ type: z.literal('unread'), update: unreadUpdateSchema }),
    z.object({ type: z.literal('revocation'), subject: revocationSubjectSchema }),
  ])

// ---------------------------------------------------------------------------
// Client → server
// ---------------------------------------------------------------------------

const conversationTargetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('direct'), peerId: id }),
  z.object({ kind: z.literal('group'), groupId: id }),
])

export const clientFrameSchema = z.discriminatedUnion('type', [
  /** The only in-band credential exchange; must be the first frame. */
  z.object({ type: z.literal('auth'), token: z.string().min(1) }),
  z.object({ type: z.literal('heartbeat') }),
  z.object({
    type: z.literal('send'),
    requestId: id,
    target: conversationTargetSchema,
    payload,
  }),
  z.object({ type: z.literal('edit'), requestId: id, messageId: id, payload }),
  z.object({ type: z.literal('delete'), requestId: id, messageId: id }),
  z.object({
    type: z.literal('read'),
    requestId: id,
    conversationId: id,
    sequence,
  }),
])

export type ClientFrame = z.infer<typeof clientFrameSchema>

// ---------------------------------------------------------------------------
// Server → client
// ---------------------------------------------------------------------------

export type DeliveryStatus = 'delivered' | 'degraded'

const ackResultSchema = z.object({
  messageId: id,
  conversationId: id,
  sequence,
  /** `degraded`: persisted, but cross-process fan-out may be late. */
  delivery: z.enum(['delivered', 'degraded']),
})

export type AckResult = z.infer<typeof ackResultSchema>

export const serverFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), connectionId: id, principal: principalSchema }),
  z.object({ type: z.literal('event'), event: deliveryEventSchema }),
  z.object({ type: z.literal('receipt'), receipt: readReceiptSchema }),
  /** The receiving principal's own unread count in a conversation. */
  z.object({ type: z.literal('unread'), conversationId: id, count: sequence }),
  z.object({ type: z.literal('heartbeat:ack'), at: z.number() }),
  z.object({ type: z.literal('ack'), requestId: id, result: ackResultSchema.nullable() }),
  z.object({
    type: z.literal('error'),
    requestId: id.nullable(),
    code: z.string(),
    message: z.string(),
  }),
])

export type ServerFrame = z.infer<typeof serverFrameSchema>

/**
 * Parse a raw text frame against `schema`. Returns `null` for invalid JSON or
 * a shape mismatch; the caller decides whether that is fatal.
 */
export function decodeFrame<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: string,
): T | null {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return null
  }
  const result = schema.safeParse(json)
  return result.success ? result.data : null
}
