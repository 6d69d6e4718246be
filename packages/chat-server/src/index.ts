export { createChatServer } from './server.js'
export type { ChatServer, ChatServerOptions } from './server.js'
export { superviseConnection } from './supervisor.js'
export type {
  ConnectionState,
  SupervisedConnection,
  SupervisorContext,
  SupervisorOptions,
} from './supervisor.js'
export { createDeliveryRouter } from './router.js'
export type {
  DeliveryResult,
  DeliveryRouter,
  DeliveryRouterOptions,
  ReceiptResult,
} from './router.js'
export { createSessionRegistry } from './registry.js'
export type { SessionRegistry } from './registry.js'
export { createBrokerBridge } from './bridge.js'
export type {
  BrokerBridge,
  BrokerBridgeOptions,
  BrokerRetryOptions,
  EnvelopeHandler,
} from './bridge.js'
export { createDedup } from './dedup.js'
export type { DedupOptions, DeduplicationFilter } from './dedup.js'
export { createOutboundQueue } from './outboundQueue.js'
export type { OutboundQueue, OutboundQueueOptions } from './outboundQueue.js'
export { memoryAdapter, createMemoryHub } from './adapters/memory.js'
export type { MemoryHub } from './adapters/memory.js'
export { natsAdapter } from './adapters/nats.js'
export type {
  NatsAdapterOptions,
  NatsConnect,
  NatsConnectionLike,
  NatsMsgLike,
} from './adapters/nats.js'
export { wsTransport } from './wsTransport.js'
export { createMemoryMessageStore } from './memoryMessageStore.js'
export type {
  MemoryMessageStore,
  MemoryMessageStoreOptions,
  StoredMessage,
} from './memoryMessageStore.js'
export { loadConfig, serverOptionsFromConfig, tokenOptionsFromConfig } from './config.js'
export type { ChatConfig } from './config.js'
export { CLOSE_CODES } from './types.js'
export type {
  BrokerAdapter,
  ClientTransport,
  CloseReason,
  ConnectionPhase,
  LiveConnection,
} from './types.js'
