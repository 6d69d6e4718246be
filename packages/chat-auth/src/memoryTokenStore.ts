import type { RevocationSubject } from '@relaychat/core'
import type {
  MarkUsedResult,
  RefreshTokenRecord,
  RevocationCheck,
  TokenStore,
} from './types.js'

export interface MemoryTokenStoreOptions {
  /**
   * How often recording a token also drops expired records, in seconds.
   * @default 3600
   */
  pruneIntervalSeconds?: number
  /** Clock source in milliseconds. Defaults to `Date.now`. */
  now?: () => number
}

export interface MemoryTokenStore extends TokenStore {
  /** Look up a stored record (for tests and admin tooling). */
  get(tokenId: string): RefreshTokenRecord | undefined
  /** Drop records whose expiry is before `now` (seconds). Returns the count. */
  prune(now: number): number
}

/**
 * In-process {@link TokenStore} for development, tests and single-instance
 * deployments.
 *
 * Each method body runs synchronously before its first await point, so the
 * check-and-set in `markUsed` cannot interleave with another call.
 */
export function createMemoryTokenStore(options: MemoryTokenStoreOptions = {}): MemoryTokenStore {
  const { pruneIntervalSeconds = 3600, now = Date.now } = options
  const records = new Map<string, RefreshTokenRecord>()
  const revokedChains = new Set<string>()
  const revokedTokens = new Set<string>()
  // principal id → tokens issued at or before this millisecond are revoked
  const revokedBefore = new Map<string, number>()
  let lastPrune = Math.floor(now() / 1000)

  function prune(at: number): number {
    let removed = 0
    for (const [tokenId, record] of records) {
      if (record.expiresAt < at) {
        records.delete(tokenId)
        removed++
      }
    }
    return removed
  }

  return {
    async recordRefreshToken(record) {
      const at = Math.floor(now() / 1000)
      if (at - lastPrune >= pruneIntervalSeconds) {
        lastPrune = at
        prune(at)
      }
      records.set(record.tokenId, record)
    },

    async markUsed(tokenId, replacement): Promise<MarkUsedResult> {
      const previous = records.get(tokenId)
      if (!previous) return { status: 'unknown' }
      if (previous.used) return { status: 'already-used', previous }

      records.set(tokenId, { ...previous, used: true })
      records.set(replacement.tokenId, replacement)
      return { status: 'rotated', previous }
    },

    async revoke(subject: RevocationSubject, at: number) {
      switch (subject.kind) {
        case 'chain':
          revokedChains.add(subject.chainId)
          break
        case 'token':
          revokedTokens.add(subject.tokenId)
          break
        case 'principal': {
          const current = revokedBefore.get(subject.principalId) ?? 0
          revokedBefore.set(subject.principalId, Math.max(current, at))
          break
        }
      }
    },

    async isRevoked(check: RevocationCheck) {
      if (revokedTokens.has(check.tokenId)) return true
      if (revokedChains.has(check.chainId)) return true
      const before = revokedBefore.get(check.principalId)
      return before !== undefined && check.issuedAtMs <= before
    },

    get(tokenId) {
      return records.get(tokenId)
    },

    prune,
  }
}
