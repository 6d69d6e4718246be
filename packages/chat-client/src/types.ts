import type { ChatError, ConversationId, DeliveryEvent, ReadReceipt } from '@relaychat/core'

export type ConnectionStatus =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'

export type StatusListener = (status: ConnectionStatus) => void
export type DeliveryListener = (event: DeliveryEvent) => void
export type ReceiptListener = (receipt: ReadReceipt) => void
export type UnreadListener = (conversationId: ConversationId, count: number) => void
/** Errors the server reports outside any request, such as a revoked session. */
export type ErrorListener = (error: ChatError) => void
