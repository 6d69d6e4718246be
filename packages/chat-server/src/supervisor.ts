import { Store } from '@tanstack/store'
import {
  ChatError,
  clientFrameSchema,
  decodeFrame,
  describeError,
  isAuthErrorCode,
  isChatError,
} from '@relaychat/core'
import type {
  AckResult,
  ChatErrorCode,
  ClientFrame,
  Logger,
  Principal,
  ServerFrame,
} from '@relaychat/core'
import type {
  AuthenticatedPrincipal,
  SessionClaims,
  TokenService,
} from '@relaychat/auth'
import { createOutboundQueue } from './outboundQueue.js'
import type { DeliveryResult, DeliveryRouter } from './router.js'
import type { SessionRegistry } from './registry.js'
import { CLOSE_CODES } from './types.js'
import type {
  ClientTransport,
  CloseReason,
  ConnectionPhase,
  LiveConnection,
} from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SupervisorOptions {
  /**
   * Expected client heartbeat period in ms. Liveness is checked this often.
   * @default 15000
   */
  heartbeatIntervalMs?: number
  /**
   * Heartbeat intervals a client may stay silent before it is dropped.
   * @default 2
   */
  missedHeartbeats?: number
  /**
   * How often the access token is re-validated, in ms.
   * @default 30000
   */
  revalidationIntervalMs?: number
  /**
   * Time allowed between accepting the transport and a valid auth frame.
   * @default 10000
   */
  authTimeoutMs?: number
  /**
   * Frames that may wait in a connection's outbound queue. Overflow drops
   * the connection.
   * @default 256
   */
  queueCapacity?: number
  /** @default 16 */
  sendWindow?: number
  /**
   * Upper bound on a graceful close: in-flight requests and queued frames
   * get this long before the transport is closed anyway.
   * @default 5000
   */
  closeTimeoutMs?: number
}

export interface SupervisorContext {
  tokens: Pick<TokenService, 'validateAccess'>
  registry: SessionRegistry
  router: DeliveryRouter
  now: () => number
  logger: Logger
}

export interface ConnectionState {
  phase: ConnectionPhase
  principal: Principal | null
  session: SessionClaims | null
  connectedAt: number
  lastHeartbeatAt: number
  closeReason: CloseReason | null
}

export interface SupervisedConnection extends LiveConnection {
  readonly store: Store<ConnectionState>
  readonly state: ConnectionState
  /**
   * Re-check the access token now. An auth failure closes the connection;
   * resolves once that close has finished.
   */
  revalidate(): Promise<void>
  /**
   * Close for `reason`. `heartbeat-timeout`, `queue-overflow` and
   * `transport-closed` drop queued frames; every other reason lets in-flight
   * requests finish and the queue flush, bounded by `closeTimeoutMs`.
   */
  close(reason: CloseReason): Promise<void>
  /** Resolves once the phase is `closed`. */
  readonly closed: Promise<void>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FORCED: ReadonlySet<CloseReason> = new Set<CloseReason>([
  'heartbeat-timeout',
  'queue-overflow',
  'transport-closed',
])

/** `null` for errors that say nothing about the credential. */
function closeReasonFor(code: ChatErrorCode): CloseReason | null {
  if (!isAuthErrorCode(code)) return null
  switch (code) {
    case 'AuthExpired':
      return 'auth-expired'
    case 'AuthInvalid':
      return 'auth-failed'
    default:
      return 'auth-revoked'
  }
}

function errorFrame(requestId: string | null, err: unknown): ServerFrame {
  if (isChatError(err)) {
    return { type: 'error', requestId, code: err.code, message: err.message }
  }
  return { type: 'error', requestId, code: 'Internal', message: '[chat] Internal error' }
}

/** Resolves `true` when `work` settles first, `false` on timeout. */
function within(work: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms)
    const done = () => {
      clearTimeout(timer)
      resolve(true)
    }
    work.then(done, done)
  })
}

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

/**
 * Runs one client connection through
 * `connecting → authenticated → active → closing → closed`.
 *
 * The first frame must be `auth`. Inbound frames are handled one at a time
 * in arrival order; outbound frames go through a bounded queue. Liveness and
 * the access token are checked on separate timers, each at its own interval.
 */
export function superviseConnection(
  id: string,
  transport: ClientTransport,
  context: SupervisorContext,
  options: SupervisorOptions = {},
): SupervisedConnection {
  const {
    heartbeatIntervalMs = 15_000,
    missedHeartbeats = 2,
    revalidationIntervalMs = 30_000,
    authTimeoutMs = 10_000,
    queueCapacity = 256,
    sendWindow = 16,
    closeTimeoutMs = 5_000,
  } = options
  const { tokens, registry, router, now, logger } = context

  const store = new Store<ConnectionState>({
    phase: 'connecting',
    principal: null,
    session: null,
    connectedAt: now(),
    lastHeartbeatAt: now(),
    closeReason: null,
  })

  let token: string | null = null
  let inbound: Promise<void> = Promise.resolve()
  let revalidating: Promise<void> | null = null
  let transportGone = false
  let heartbeatTimer: ReturnType<typeof setInterval> | null = null
  let revalidationTimer: ReturnType<typeof setInterval> | null = null
  let authTimer: ReturnType<typeof setTimeout> | null = null
  let resolveClosed: () => void = () => {}
  const closed = new Promise<void>((resolve) => {
    resolveClosed = resolve
  })

  const queue = createOutboundQueue({
    capacity: queueCapacity,
    window: sendWindow,
    write: (data, done) => transport.send(data, done),
    onOverflow: () => {
      logger.warn('outbound queue overflow, dropping connection', {
        connectionId: id,
        principalId: store.state.principal?.id,
        capacity: queueCapacity,
      })
      terminate('queue-overflow')
    },
    onError: (err) => {
      logger.debug('write failed', { connectionId: id, ...describeError(err) })
      terminate('transport-closed')
    },
  })

  function update(patch: Partial<ConnectionState>): void {
    store.setState((state) => ({ ...state, ...patch }))
  }

  function isOpen(): boolean {
    const { phase } = store.state
    return phase !== 'closing' && phase !== 'closed'
  }

  function push(frame: ServerFrame): boolean {
    if (store.state.phase === 'closed') return false
    return queue.enqueue(JSON.stringify(frame))
  }

  function clearTimers(): void {
    if (authTimer) {
      clearTimeout(authTimer)
      authTimer = null
    }
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer)
      heartbeatTimer = null
    }
    if (revalidationTimer) {
      clearInterval(revalidationTimer)
      revalidationTimer = null
    }
  }

  // --- Closing --------------------------------------------------------------

  function beginClosing(reason: CloseReason): boolean {
    if (!isOpen()) return false
    clearTimers()
    const { principal } = store.state
    if (principal) registry.unregister(principal.id, connection)
    update({ phase: 'closing', closeReason: reason })
    return true
  }

  function finish(): void {
    if (store.state.phase === 'closed') return
    const dropped = queue.close()
    const reason = store.state.closeReason ?? 'transport-closed'
    update({ phase: 'closed' })
    if (!transportGone) {
      transportGone = true
      transport.close(CLOSE_CODES[reason], reason)
    }
    logger.info('connection closed', {
      connectionId: id,
      principalId: store.state.principal?.id,
      reason,
      dropped,
    })
    resolveClosed()
  }

  function terminate(reason: CloseReason): void {
    if (store.state.phase === 'closed') return
    if (reason === 'transport-closed') transportGone = true
    beginClosing(reason)
    finish()
  }

  async function drainAndFinish(): Promise<void> {
    const flushed = await within(
      inbound.then(() => queue.drained()),
      closeTimeoutMs,
    )
    if (!flushed) {
      logger.warn('close timed out, dropping queued frames', {
        connectionId: id,
        pending: queue.pending,
      })
    }
    finish()
  }

  function close(reason: CloseReason): Promise<void> {
    if (FORCED.has(reason)) {
      terminate(reason)
      return closed
    }
    if (beginClosing(reason)) {
      drainAndFinish().catch((err: unknown) => {
        logger.error('graceful close failed', { connectionId: id, ...describeError(err) })
        finish()
      })
    }
    return closed
  }

  function reject(reason: CloseReason, err: unknown): void {
    push(errorFrame(null, err))
    void close(reason)
  }

  // --- Authentication -------------------------------------------------------

  async function authenticate(candidate: string): Promise<void> {
    let auth: AuthenticatedPrincipal
    try {
      auth = await tokens.validateAccess(candidate)
    } catch (err) {
      if (store.state.phase !== 'connecting') return
      const reason = (isChatError(err) ? closeReasonFor(err.code) : null) ?? 'auth-failed'
      logger.info('authentication failed', { connectionId: id, ...describeError(err) })
      reject(reason, err)
      return
    }
    // Closed while the token was being checked.
    if (store.state.phase !== 'connecting') return

    if (authTimer) {
      clearTimeout(authTimer)
      authTimer = null
    }
    token = candidate
    update({
      phase: 'authenticated',
      principal: auth.principal,
      session: auth.session,
      lastHeartbeatAt: now(),
    })
    push({ type: 'ready', connectionId: id, principal: auth.principal })
    registry.register(auth.principal.id, connection)
    update({ phase: 'active' })
    heartbeatTimer = setInterval(checkHeartbeat, heartbeatIntervalMs)
    revalidationTimer = setInterval(() => {
      revalidate().catch((err: unknown) => {
        logger.error('revalidation crashed', { connectionId: id, ...describeError(err) })
      })
    }, revalidationIntervalMs)
    logger.info('connection active', { connectionId: id, principalId: auth.principal.id })
  }

  async function runRevalidation(): Promise<void> {
    if (store.state.phase !== 'active' || token === null) return
    try {
      const auth = await tokens.validateAccess(token)
      if (store.state.phase !== 'active') return
      update({ principal: auth.principal, session: auth.session })
    } catch (err) {
      if (store.state.phase !== 'active') return
      const reason = isChatError(err) ? closeReasonFor(err.code) : null
      if (!reason) {
        logger.warn('revalidation failed, keeping connection', {
          connectionId: id,
          ...describeError(err),
        })
        return
      }
      logger.info('credential no longer valid', {
        connectionId: id,
        principalId: store.state.principal?.id,
        reason,
      })
      push(errorFrame(null, err))
      await close(reason)
    }
  }

  function revalidate(): Promise<void> {
    if (!revalidating) {
      revalidating = runRevalidation().finally(() => {
        revalidating = null
      })
    }
    return revalidating
  }

  // --- Liveness -------------------------------------------------------------

  function checkHeartbeat(): void {
    if (store.state.phase !== 'active') return
    const silentFor = now() - store.state.lastHeartbeatAt
    if (silentFor > heartbeatIntervalMs * missedHeartbeats) {
      logger.info('heartbeat timeout', { connectionId: id, silentFor })
      terminate('heartbeat-timeout')
    }
  }

  // --- Inbound --------------------------------------------------------------

  async function respond(
    requestId: string,
    run: (principal: Principal) => Promise<AckResult | null>,
  ): Promise<void> {
    const { principal } = store.state
    if (!principal) return
    try {
      push({ type: 'ack', requestId, result: await run(principal) })
    } catch (err) {
      if (!isChatError(err)) {
        logger.error('request failed', { connectionId: id, requestId, ...describeError(err) })
      }
      push(errorFrame(requestId, err))
    }
  }

  function ackFor({ event, delivery }: DeliveryResult): AckResult {
    return {
      messageId: event.messageId,
      conversationId: event.conversationId,
      sequence: event.sequence,
      delivery,
    }
  }

  async function handleFrame(frame: ClientFrame | null): Promise<void> {
    const { phase } = store.state
    if (phase === 'closing' || phase === 'closed') return

    if (phase === 'connecting') {
      if (!frame || frame.type !== 'auth') {
        reject('auth-failed', new ChatError('AuthInvalid', 'First frame must be an auth frame'))
        return
      }
      await authenticate(frame.token)
      return
    }

    if (!frame) {
      push({ type: 'error', requestId: null, code: 'ProtocolError', message: '[chat] Malformed frame' })
      return
    }

    switch (frame.type) {
      case 'auth':
        push({ type: 'error', requestId: null, code: 'ProtocolError', message: '[chat] Already authenticated' })
        return
      case 'heartbeat':
        push({ type: 'heartbeat:ack', at: now() })
        return
      case 'send':
        await respond(frame.requestId, async (principal) =>
          ackFor(await router.send(principal, frame.target, frame.payload)),
        )
        return
      case 'edit':
        await respond(frame.requestId, async (principal) =>
          ackFor(await router.edit(principal, frame.messageId, frame.payload)),
        )
        return
      case 'delete':
        await respond(frame.requestId, async (principal) =>
          ackFor(await router.remove(principal, frame.messageId)),
        )
        return
      case 'read':
        await respond(frame.requestId, async (principal) => {
          await router.markRead(principal, frame.conversationId, frame.sequence)
          return null
        })
        return
    }
  }

  transport.onMessage((raw) => {
    if (!isOpen()) return
    // Any inbound traffic proves liveness, even while earlier frames are
    // still being handled.
    if (store.state.phase === 'active') update({ lastHeartbeatAt: now() })
    const frame = decodeFrame(clientFrameSchema, raw)
    inbound = inbound
      .then(() => handleFrame(frame))
      .catch((err: unknown) => {
        logger.error('frame handler failed', { connectionId: id, ...describeError(err) })
      })
  })

  transport.onClose(() => {
    terminate('transport-closed')
  })

  authTimer = setTimeout(() => {
    authTimer = null
    if (store.state.phase !== 'connecting') return
    logger.info('authentication timed out', { connectionId: id })
    reject('auth-failed', new ChatError('AuthInvalid', 'Authentication timed out'))
  }, authTimeoutMs)

  const connection: SupervisedConnection = {
    id,
    get principalId() {
      return store.state.principal?.id ?? ''
    },
    push,
    store,
    get state() {
      return store.state
    },
    revalidate,
    close,
    closed,
  }

  return connection
}
