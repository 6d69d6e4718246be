import type { PrincipalId } from '@relaychat/core'
import type { LiveConnection } from './types.js'

/**
 * Process-local map from principal id to that principal's live connections.
 *
 * Every method runs to completion synchronously, so register, unregister
 * and lookup never interleave. `connectionsFor` returns a snapshot: callers
 * may iterate it while connections come and go.
 */
export interface SessionRegistry {
  register(principalId: PrincipalId, connection: LiveConnection): void
  /** No-op when the connection is not registered. */
  unregister(principalId: PrincipalId, connection: LiveConnection): void
  /** Snapshot of the principal's connections; empty when there are none. */
  connectionsFor(principalId: PrincipalId): ReadonlySet<LiveConnection>
  /** Principals with at least one live connection. */
  principals(): ReadonlyArray<PrincipalId>
  /** Total number of registered connections. */
  size(): number
}

export function createSessionRegistry(): SessionRegistry {
  const byPrincipal = new Map<PrincipalId, Set<LiveConnection>>()

  return {
    register(principalId, connection) {
      let connections = byPrincipal.get(principalId)
      if (!connections) {
        connections = new Set()
        byPrincipal.set(principalId, connections)
      }
      connections.add(connection)
    },

    unregister(principalId, connection) {
      const connections = byPrincipal.get(principalId)
      if (!connections) return
      connections.delete(connection)
      if (connections.size === 0) byPrincipal.delete(principalId)
    },

    connectionsFor(principalId) {
      return new Set(byPrincipal.get(principalId))
    },

    principals() {
      return Array.from(byPrincipal.keys())
    },

    size() {
      let total = 0
      for (const connections of byPrincipal.values()) total += connections.size
      return total
    },
  }
}
