export { createChatClient } from './client.js'
export type { ChatClient, ChatClientOptions } from './client.js'
export { createTimeline } from './timeline.js'
export type { Timeline, TimelineEntry, TimelineState } from './timeline.js'
export type {
  ConnectionStatus,
  StatusListener,
  DeliveryListener,
  ReceiptListener,
  UnreadListener,
  ErrorListener,
} from './types.js'
