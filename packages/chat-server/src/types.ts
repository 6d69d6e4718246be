import type { PrincipalId, ServerFrame } from '@relaychat/core'

// ---------------------------------------------------------------------------
// Broker
// ---------------------------------------------------------------------------

/**
 * Shared pub/sub channel between backend instances. Delivery is
 * at-least-once with no ordering guarantee; every subscriber receives every
 * publish, the publishing instance's own included.
 */
export interface BrokerAdapter {
  /** Publish an encoded envelope to all instances. */
  publish(data: string): Promise<void>
  /** Receive encoded envelopes from all instances. */
  subscribe(callback: (data: string) => void): Promise<void>
  /** Cleanup */
  close(): Promise<void>
}

// ---------------------------------------------------------------------------
// Client transport
// ---------------------------------------------------------------------------

/**
 * One bidirectional text channel to a client. The `ws` binding lives in
 * `wsTransport`; tests supply in-process fakes.
 */
export interface ClientTransport {
  /**
   * Write one frame. `done` fires once the frame has left the process, or
   * with an error. A peer that stops reading stops the callbacks.
   */
  send(data: string, done: (err?: Error) => void): void
  /** Close with a WebSocket close code. */
  close(code: number, reason: string): void
  onMessage(handler: (data: string) => void): void
  /** Fires once when the underlying channel is gone, whoever closed it. */
  onClose(handler: () => void): void
}

// ---------------------------------------------------------------------------
// Connections
// ---------------------------------------------------------------------------

/**
 * A live connection as seen by the registry and the router: something
 * frames can be pushed onto.
 */
export interface LiveConnection {
  readonly id: string
  readonly principalId: PrincipalId
  /**
   * Queue a frame for the client. Never blocks. Returns `false` when the
   * frame was not accepted (connection closing, or the queue overflowed and
   * the connection is being dropped).
   */
  push(frame: ServerFrame): boolean
}

export type ConnectionPhase =
  | 'connecting'
  | 'authenticated'
  | 'active'
  | 'closing'
  | 'closed'

export type CloseReason =
  | 'auth-failed'
  | 'auth-expired'
  | 'auth-revoked'
  | 'heartbeat-timeout'
  | 'queue-overflow'
  | 'protocol-error'
  | 'server-shutdown'
  | 'transport-closed'

/** WebSocket close code sent for each reason. */
export const CLOSE_CODES = {
  'auth-failed': 4001,
  'auth-expired': 4002,
  'auth-revoked': 4003,
  'heartbeat-timeout': 4008,
  'queue-overflow': 4009,
  'protocol-error': 4400,
  'server-shutdown': 1001,
  // Never sent: the channel is already gone.
  'transport-closed': 1006,
} as const satisfies Record<CloseReason, number>
