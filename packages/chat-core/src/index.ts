/**
 * @relaychat/core
 *
 * Types, wire protocol and small utilities shared by the auth, server and
 * client packages.
 */

export type {
  PrincipalId,
  Principal,
  ConversationId,
  ConversationTarget,
  DeliveryKind,
  DeliveryEvent,
  ReadReceipt,
  UnreadCount,
  UnreadUpdate,
  RevocationSubject,
  BrokerEnvelope,
  PersistedChange,
  ReadMarkerChange,
  MessageStore,
  PrincipalDirectory,
} from './types.js'
export { conversationIdFor, parseConversationId } from './conversationKey.js'
export type { ParsedConversation } from './conversationKey.js'
export { ChatError, isChatError, isChatErrorCode, isAuthErrorCode } from './errors.js'
export type { ChatErrorCode } from './errors.js'
export { consoleLogger, silentLogger, describeError } from './logger.js'
export type { Logger, LogContext } from './logger.js'
export { createTtlCache } from './ttlCache.js'
export type { TtlCache, TtlCacheOptions } from './ttlCache.js'
export {
  MAX_PAYLOAD_LENGTH,
  principalSchema,
  deliveryEventSchema,
  readReceiptSchema,
  unreadUpdateSchema,
  revocationSubjectSchema,
  brokerEnvelopeSchema,
  clientFrameSchema,
  serverFrameSchema,
  decodeFrame,
} from './protocol.js'
export type {
  ClientFrame,
  ServerFrame,
  AckResult,
  DeliveryStatus,
} from './protocol.js'
