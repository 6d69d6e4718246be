import { WebSocket } from 'ws'
import {
  ChatError,
  consoleLogger,
  decodeFrame,
  describeError,
  isChatErrorCode,
  serverFrameSchema,
} from '@relaychat/core'
import type {
  AckResult,
  ClientFrame,
  ConversationId,
  ConversationTarget,
  Logger,
  Principal,
  ServerFrame,
} from '@relaychat/core'
import { createTimeline } from './timeline.js'
import type { Timeline } from './timeline.js'
import type {
  ConnectionStatus,
  ErrorListener,
  DeliveryListener,
  ReceiptListener,
  StatusListener,
  UnreadListener,
} from './types.js'

export interface ChatClientOptions {
  /** WebSocket URL of the chat endpoint, e.g. `"ws://localhost:3000/_chat"`. */
  url: string
  /** Returns a current access token. Called before every (re)connect. */
  getToken: () => string | Promise<string>
  /** Reconnection back-off settings. */
  reconnect?: {
    /** Initial delay in ms. Default: 1000 */
    initialDelay?: number
    /** Maximum delay in ms. Default: 30000 */
    maxDelay?: number
    /**
     * Jitter factor applied to each delay as a multiplier in `[-jitter, +jitter]`.
     * Default: 0.25
     */
    jitter?: number
  }
  /** Heartbeat period in ms. Keep it at or below the server's. Default: 15000 */
  heartbeatIntervalMs?: number
  /** How long a request waits for its reply. Default: 10000 */
  requestTimeoutMs?: number
  logger?: Logger
}

export interface ChatClient {
  /** Open the connection. Reconnects automatically until `disconnect()`. */
  connect(): void
  /** Close the connection and cancel pending reconnects. */
  disconnect(): void
  readonly status: ConnectionStatus
  /** The authenticated principal, once the server has sent `ready`. */
  readonly principal: Principal | null

  send(target: ConversationTarget, payload: string): Promise<AckResult>
  edit(messageId: string, payload: string): Promise<AckResult>
  remove(messageId: string): Promise<AckResult>
  markRead(conversationId: ConversationId, sequence: number): Promise<void>

  /** The ordered view of a conversation, fed by incoming events. */
  timeline(conversationId: ConversationId): Timeline
  /** Last unread count the server reported for a conversation, `0` before any. */
  unreadCount(conversationId: ConversationId): number

  onStatus(listener: StatusListener): () => void
  onEvent(listener: DeliveryListener): () => void
  onReceipt(listener: ReceiptListener): () => void
  onUnread(listener: UnreadListener): () => void
  onError(listener: ErrorListener): () => void

  /** Disconnect and remove all listeners. */
  destroy(): void
}

interface PendingRequest {
  resolve: (result: AckResult | null) => void
  reject: (err: ChatError) => void
  timer: ReturnType<typeof setTimeout>
}

type RequestFrame = Extract<ClientFrame, { requestId: string }>
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/** Close codes after which the token must be fetched again. */
const AUTH_CLOSE_CODES: ReadonlySet<number> = new Set([4001, 4002, 4003])

function toChatError(code: string, message: string): ChatError {
  const text = message.replace(/^\[chat\] /, '')
  return isChatErrorCode(code)
    ? new ChatError(code, text)
    : new ChatError('ProtocolError', `${code}: ${text}`)
}

export function createChatClient(options: ChatClientOptions): ChatClient {
  const { url, getToken, heartbeatIntervalMs = 15_000, requestTimeoutMs = 10_000 } = options
  const logger = options.logger ?? consoleLogger('chat:client')
  const reconnectOpts = {
    initialDelay: options.reconnect?.initialDelay ?? 1000,
    maxDelay: options.reconnect?.maxDelay ?? 30_000,
    jitter: options.reconnect?.jitter ?? 0.25,
  }

  let status: ConnectionStatus = 'disconnected'
  let principal: Principal | null = null
  let socket: WebSocket | null = null
  let opening = false
  let reconnectAttempt = 0
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null
  let heartbeatTimer: ReturnType<typeof setInterval> | null = null
  let explicitDisconnect = false
  let requestCounter = 0

  const pending = new Map<string, PendingRequest>()
  const timelines = new Map<ConversationId, Timeline>()
  const unread = new Map<ConversationId, number>()

  const statusListeners = new Set<StatusListener>()
  const eventListeners = new Set<DeliveryListener>()
  const receiptListeners = new Set<ReceiptListener>()
  const unreadListeners = new Set<UnreadListener>()
  const errorListeners = new Set<ErrorListener>()

  function setStatus(next: ConnectionStatus) {
    if (status === next) return
    status = next
    for (const l of statusListeners) l(next)
  }

  function write(frame: ClientFrame): boolean {
    if (!socket || socket.readyState !== WebSocket.OPEN) return false
    socket.send(JSON.stringify(frame))
    return true
  }

  function timeline(conversationId: ConversationId): Timeline {
    let existing = timelines.get(conversationId)
    if (!existing) {
      existing = createTimeline(conversationId)
      timelines.set(conversationId, existing)
    }
    return existing
  }

  function failPending(err: ChatError) {
    for (const [requestId, request] of pending) {
      clearTimeout(request.timer)
      pending.delete(requestId)
      request.reject(err)
    }
  }

  function startHeartbeat() {
    stopHeartbeat()
    heartbeatTimer = setInterval(() => {
      write({ type: 'heartbeat' })
    }, heartbeatIntervalMs)
  }

  function stopHeartbeat() {
    if (heartbeatTimer !== null) {
      clearInterval(heartbeatTimer)
      heartbeatTimer = null
    }
  }

  function handleFrame(frame: ServerFrame) {
    switch (frame.type) {
      case 'ready':
        principal = frame.principal
        reconnectAttempt = 0
        startHeartbeat()
        setStatus('connected')
        break
      case 'event':
        timeline(frame.event.conversationId).apply(frame.event)
        for (const l of eventListeners) l(frame.event)
        break
      case 'receipt':
        for (const l of receiptListeners) l(frame.receipt)
        break
      case 'unread':
        unread.set(frame.conversationId, frame.count)
        for (const l of unreadListeners) l(frame.conversationId, frame.count)
        break
      case 'ack': {
        const request = pending.get(frame.requestId)
        if (!request) return
        pending.delete(frame.requestId)
        clearTimeout(request.timer)
        request.resolve(frame.result)
        break
      }
      case 'error': {
        const error = toChatError(frame.code, frame.message)
        const request = frame.requestId === null ? undefined : pending.get(frame.requestId)
        if (frame.requestId !== null && request) {
          pending.delete(frame.requestId)
          clearTimeout(request.timer)
          request.reject(error)
          return
        }
        for (const l of errorListeners) l(error)
        break
      }
      // heartbeat:ack: nothing to do
    }
  }

  async function openSocket() {
    if (socket || opening) return
    opening = true
    setStatus(reconnectAttempt === 0 ? 'connecting' : 'reconnecting')

    let token: string
    try {
      token = await getToken()
    } catch (err) {
      opening = false
      logger.warn('token provider failed', describeError(err))
      scheduleReconnect()
      return
    }
    opening = false
    if (explicitDisconnect) return

    const ws = new WebSocket(url)
    socket = ws

    ws.on('open', () => {
      ws.send(JSON.stringify({ type: 'auth', token } satisfies ClientFrame))
    })

    ws.on('message', (data, isBinary) => {
      if (isBinary) return
      const frame = decodeFrame(serverFrameSchema, data.toString())
      if (!frame) {
        logger.warn('ignoring malformed server frame')
        return
      }
      handleFrame(frame)
    })

    ws.on('close', (code) => {
      if (socket === ws) socket = null
      principal = null
      stopHeartbeat()
      failPending(new ChatError('TransportClosed', `Connection closed (${code})`))
      if (explicitDisconnect) {
        setStatus('disconnected')
        return
      }
      if (AUTH_CLOSE_CODES.has(code)) {
        logger.info('session rejected by server, reconnecting with a fresh token', { code })
      }
      scheduleReconnect()
    })

    ws.on('error', () => {
      // A 'close' event always follows 'error'; let it drive the state transition.
    })
  }

  function connectSocket() {
    openSocket().catch((err: unknown) => {
      logger.error('connect failed', describeError(err))
      scheduleReconnect()
    })
  }

  function scheduleReconnect() {
    if (explicitDisconnect) return
    cancelReconnect()
    setStatus('reconnecting')
    const delay = Math.min(
      reconnectOpts.initialDelay * Math.pow(2, reconnectAttempt),
      reconnectOpts.maxDelay,
    )
    const jitter = delay * reconnectOpts.jitter * (Math.random() * 2 - 1)
    reconnectAttempt++

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null
      connectSocket()
    }, Math.max(0, delay + jitter))
  }

  function cancelReconnect() {
    if (reconnectTimer !== null) {
      clearTimeout(reconnectTimer)
      reconnectTimer = null
    }
  }

  function request(frame: DistributiveOmit<RequestFrame, 'requestId'>): Promise<AckResult | null> {
    const requestId = `r${++requestCounter}`
    return new Promise<AckResult | null>((resolve, reject) => {
      if (status !== 'connected') {
        reject(new ChatError('TransportClosed', 'Not connected'))
        return
      }
      const timer = setTimeout(() => {
        pending.delete(requestId)
        reject(new ChatError('ProtocolError', `No reply to ${frame.type} within ${requestTimeoutMs}ms`))
      }, requestTimeoutMs)
      pending.set(requestId, { resolve, reject, timer })
      if (!write({ ...frame, requestId })) {
        clearTimeout(timer)
        pending.delete(requestId)
        reject(new ChatError('TransportClosed', 'Not connected'))
      }
    })
  }

  async function requestAck(frame: DistributiveOmit<RequestFrame, 'requestId'>): Promise<AckResult> {
    const result = await request(frame)
    if (!result) throw new ChatError('ProtocolError', `Empty reply to ${frame.type}`)
    return result
  }

  function disconnectInternal() {
    explicitDisconnect = true
    cancelReconnect()
    stopHeartbeat()
    failPending(new ChatError('TransportClosed', 'Disconnected'))
    if (socket) {
      socket.close(1000, 'client disconnect')
      socket = null
    }
    principal = null
    setStatus('disconnected')
  }

  return {
    get status() {
      return status
    },

    get principal() {
      return principal
    },

    connect() {
      explicitDisconnect = false
      if (status === 'connected' || status === 'connecting') return
      reconnectAttempt = 0
      connectSocket()
    },

    disconnect() {
      disconnectInternal()
    },

    send(target, payload) {
      return requestAck({ type: 'send', target, payload })
    },

    edit(messageId, payload) {
      return requestAck({ type: 'edit', messageId, payload })
    },

    remove(messageId) {
      return requestAck({ type: 'delete', messageId })
    },

    async markRead(conversationId, sequence) {
      await request({ type: 'read', conversationId, sequence })
    },

    timeline,

    unreadCount(conversationId) {
      return unread.get(conversationId) ?? 0
    },

    onStatus(listener) {
      statusListeners.add(listener)
      return () => {
        statusListeners.delete(listener)
      }
    },

    onEvent(listener) {
      eventListeners.add(listener)
      return () => {
        eventListeners.delete(listener)
      }
    },

    onReceipt(listener) {
      receiptListeners.add(listener)
      return () => {
        receiptListeners.delete(listener)
      }
    },

    onUnread(listener) {
      unreadListeners.add(listener)
      return () => {
        unreadListeners.delete(listener)
      }
    },

    onError(listener) {
      errorListeners.add(listener)
      return () => {
        errorListeners.delete(listener)
      }
    },

    destroy() {
      disconnectInternal()
      statusListeners.clear()
      eventListeners.clear()
      receiptListeners.clear()
      unreadListeners.clear()
      errorListeners.clear()
      timelines.clear()
      unread.clear()
    },
  }
}
