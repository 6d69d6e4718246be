import { EventEmitter } from 'events'
import type { BrokerAdapter } from '../types.js'

const TOPIC = 'envelope'

/**
 * The shared "broker" behind {@link memoryAdapter}. Give several servers
 * adapters on one hub to run a multi-instance deployment in one process.
 */
export interface MemoryHub {
  readonly emitter: EventEmitter
}

export function createMemoryHub(): MemoryHub {
  const emitter = new EventEmitter()
  // One listener per attached server; a test may attach many.
  emitter.setMaxListeners(0)
  return { emitter }
}

/**
 * In-process adapter for single-instance deployments and tests. Publishes
 * are delivered synchronously to every adapter on the same hub.
 */
export function memoryAdapter(hub: MemoryHub = createMemoryHub()): BrokerAdapter {
  const { emitter } = hub
  const callbacks: Array<(data: string) => void> = []

  return {
    async publish(data: string): Promise<void> {
      emitter.emit(TOPIC, data)
    },

    async subscribe(callback: (data: string) => void): Promise<void> {
      callbacks.push(callback)
      emitter.on(TOPIC, callback)
    },

    async close(): Promise<void> {
      // Only this adapter's listeners; other servers may share the hub.
      for (const callback of callbacks.splice(0)) emitter.off(TOPIC, callback)
    },
  }
}
