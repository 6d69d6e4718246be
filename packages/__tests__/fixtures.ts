/**
 * In-process stand-ins shared by the chat tests: a scripted client
 * transport, a fixed principal directory and a server harness wired to the
 * in-memory broker, token store and message store.
 */

import { decodeFrame, serverFrameSchema, silentLogger } from '@relaychat/core'
import type { ClientFrame, Principal, PrincipalDirectory, ServerFrame } from '@relaychat/core'
import { createMemoryTokenStore, createTokenService } from '@relaychat/auth'
import type { MemoryTokenStore, TokenService } from '@relaychat/auth'
import {
  createChatServer,
  createMemoryHub,
  createMemoryMessageStore,
  memoryAdapter,
} from '@relaychat/server'
import type {
  ChatServer,
  ChatServerOptions,
  ClientTransport,
  MemoryHub,
  MemoryMessageStore,
} from '@relaychat/server'

// ---------------------------------------------------------------------------
// Principals
// ---------------------------------------------------------------------------

export const PRINCIPALS: Record<string, Principal> = {
  alice: { id: 'alice', displayName: 'Alice', groups: ['team'] },
  bob: { id: 'bob', displayName: 'Bob', groups: ['team'] },
  carol: { id: 'carol', displayName: 'Carol', groups: ['team'] },
  dave: { id: 'dave', displayName: 'Dave', groups: [] },
}

export function principal(id: keyof typeof PRINCIPALS): Principal {
  const found = PRINCIPALS[id]
  if (!found) throw new Error(`unknown test principal ${String(id)}`)
  return found
}

export function createDirectory(
  principals: Record<string, Principal> = PRINCIPALS,
): PrincipalDirectory & { remove(id: string): void } {
  const known = new Map(Object.entries(principals))
  return {
    async loadPrincipal(id) {
      return known.get(id) ?? null
    },
    remove(id) {
      known.delete(id)
    },
  }
}

export function createStorage(): MemoryMessageStore {
  return createMemoryMessageStore({
    principals: Object.keys(PRINCIPALS),
    groups: { team: ['alice', 'bob', 'carol'] },
  })
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface FakeTransport extends ClientTransport {
  /** Frames written to the client, in order. */
  readonly frames: ServerFrame[]
  /** Close code and reason, once the server closed the transport. */
  closedWith: { code: number; reason: string } | null
  /** While true, write callbacks are held back (a client that stopped reading). */
  stalled: boolean
  /** Deliver a frame from the client. Strings are sent verbatim. */
  receive(frame: ClientFrame | string): void
  /** The client went away. */
  drop(): void
  framesOfType<T extends ServerFrame['type']>(type: T): Array<Extract<ServerFrame, { type: T }>>
}

export function createFakeTransport(): FakeTransport {
  const messageHandlers: Array<(data: string) => void> = []
  const closeHandlers: Array<() => void> = []
  let gone = false

  function fireClose(): void {
    if (gone) return
    gone = true
    for (const handler of closeHandlers) handler()
  }

  const transport: FakeTransport = {
    frames: [],
    closedWith: null,
    stalled: false,

    send(data, done) {
      const frame = decodeFrame(serverFrameSchema, data)
      if (!frame) throw new Error(`server wrote an invalid frame: ${data}`)
      transport.frames.push(frame)
      if (!transport.stalled) done()
    },

    close(code, reason) {
      transport.closedWith = { code, reason }
      fireClose()
    },

    onMessage(handler) {
      messageHandlers.push(handler)
    },

    onClose(handler) {
      closeHandlers.push(handler)
    },

    receive(frame) {
      const data = typeof frame === 'string' ? frame : JSON.stringify(frame)
      for (const handler of messageHandlers) handler(data)
    },

    drop() {
      fireClose()
    },

    framesOfType<T extends ServerFrame['type']>(type: T) {
      return transport.frames.filter(
        (frame): frame is Extract<ServerFrame, { type: T }> => frame.type === type,
      )
    },
  }
  return transport
}

/** Let every pending promise continuation run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

// ---------------------------------------------------------------------------
// Server harness
// ---------------------------------------------------------------------------

export const ACCESS_SECRET = 'test-access-secret'
export const REFRESH_SECRET = 'test-refresh-secret'

export interface Harness {
  server: ChatServer
  tokens: TokenService
  tokenStore: MemoryTokenStore
  storage: MemoryMessageStore
  hub: MemoryHub
  /** Accept a fake transport and authenticate it as `id`. */
  connect(id: keyof typeof PRINCIPALS): Promise<FakeTransport>
}

export interface HarnessOptions extends Partial<Omit<ChatServerOptions, 'tokens' | 'storage'>> {
  hub?: MemoryHub
  tokenStore?: MemoryTokenStore
  storage?: MemoryMessageStore
}

/**
 * A chat server on the in-memory broker. Harnesses given the same `hub`,
 * `tokenStore` and `storage` behave like instances of one deployment.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const {
    hub = createMemoryHub(),
    tokenStore = createMemoryTokenStore(),
    storage = createStorage(),
    ...serverOptions
  } = options

  const tokens = createTokenService({
    accessSecret: ACCESS_SECRET,
    refreshSecret: REFRESH_SECRET,
    store: tokenStore,
    directory: createDirectory(),
    logger: silentLogger,
  })
  const server = createChatServer({
    adapter: memoryAdapter(hub),
    logger: silentLogger,
    ...serverOptions,
    tokens,
    storage,
  })

  return {
    server,
    tokens,
    tokenStore,
    storage,
    hub,
    async connect(id) {
      const transport = createFakeTransport()
      server.accept(transport)
      const { accessToken } = await tokens.issue(principal(id))
      transport.receive({ type: 'auth', token: accessToken })
      await settle()
      return transport
    },
  }
}
