import {
  ChatError,
  brokerEnvelopeSchema,
  consoleLogger,
  decodeFrame,
  describeError,
} from '@relaychat/core'
import type { BrokerEnvelope, Logger } from '@relaychat/core'
import type { BrokerAdapter } from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BrokerRetryOptions {
  /**
   * Total publish attempts before giving up.
   * @default 3
   */
  attempts?: number
  /**
   * Delay before the second attempt; doubles after each failure.
   * @default 100
   */
  delayMs?: number
}

export interface BrokerBridgeOptions {
  adapter: BrokerAdapter
  retry?: BrokerRetryOptions
  logger?: Logger
}

export type EnvelopeHandler = (envelope: BrokerEnvelope) => void

/**
 * Typed wrapper over a {@link BrokerAdapter}: encodes and validates
 * envelopes and retries failed publishes.
 */
export interface BrokerBridge {
  /** Fails with `PublishFailure` once every attempt has failed. */
  publish(envelope: BrokerEnvelope): Promise<void>
  /**
   * Receive every envelope published by any instance, this one included.
   * Malformed payloads are logged and dropped. Returns an unsubscribe
   * function.
   */
  subscribe(handler: EnvelopeHandler): Promise<() => void>
  close(): Promise<void>
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function createBrokerBridge(options: BrokerBridgeOptions): BrokerBridge {
  const { adapter, retry = {}, logger = consoleLogger('chat:broker') } = options
  const attempts = Math.max(1, retry.attempts ?? 3)
  const baseDelay = retry.delayMs ?? 100

  const handlers = new Set<EnvelopeHandler>()
  let attached: Promise<void> | null = null

  function dispatch(data: string): void {
    const envelope = decodeFrame(brokerEnvelopeSchema, data)
    if (!envelope) {
      logger.warn('dropping malformed broker payload', { length: data.length })
      return
    }
    for (const handler of handlers) {
      try {
        handler(envelope)
      } catch (err) {
        logger.error('broker handler failed', { type: envelope.type, ...describeError(err) })
      }
    }
  }

  return {
    async publish(envelope) {
      const data = JSON.stringify(envelope)
      let lastError: unknown
      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          await adapter.publish(data)
          return
        } catch (err) {
          lastError = err
          logger.warn('publish attempt failed', {
            type: envelope.type,
            attempt,
            ...describeError(err),
          })
          if (attempt < attempts) await delay(baseDelay * 2 ** (attempt - 1))
        }
      }
      throw new ChatError(
        'PublishFailure',
        `Broker publish failed after ${attempts} attempts`,
        { cause: lastError },
      )
    },

    async subscribe(handler) {
      handlers.add(handler)
      if (!attached) {
        attached = adapter.subscribe(dispatch).catch((err: unknown) => {
          attached = null
          throw err
        })
      }
      try {
        await attached
      } catch (err) {
        handlers.delete(handler)
        throw err
      }
      return () => {
        handlers.delete(handler)
      }
    },

    async close() {
      handlers.clear()
      attached = null
      await adapter.close()
    },
  }
}
