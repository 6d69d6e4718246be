/**
 * TTL cache: a key-value store where entries expire a fixed time after
 * their last `set()`.
 *
 * Used for per-process caches of slowly changing collaborator data
 * (principals, conversation members). Expiry is checked on read, so the
 * cache holds no timers and needs no teardown.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TtlCacheOptions {
  /**
   * Time-to-live in milliseconds.
   * @default 60000
   */
  ttl?: number
  /**
   * Maximum number of entries. The oldest entry is evicted when full.
   * @default 10000
   */
  maxSize?: number
  /** Clock source, in milliseconds. Defaults to `Date.now`. */
  now?: () => number
}

export interface TtlCache<T> {
  /** Set or refresh a key. Resets its expiry. */
  set(key: string, value: T): void
  /** The current value, or `undefined` if expired or absent. */
  get(key: string): T | undefined
  has(key: string): boolean
  /** Remove a key before its TTL. No-op when absent. */
  delete(key: string): void
  /** Number of entries held, expired ones not yet evicted included. */
  size(): number
  clear(): void
  /**
   * Return the cached value or load, cache and return it. Concurrent calls
   * for the same key share one load. `null` results are not cached.
   */
  getOrLoad(key: string, load: () => Promise<T | null>): Promise<T | null>
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * @example
 * const members = createTtlCache<ReadonlySet<string>>({ ttl: 30_000 })
 * const set = await members.getOrLoad(conversationId, () => store.membersOf(conversationId))
 */
export function createTtlCache<T>(options: TtlCacheOptions = {}): TtlCache<T> {
  const { ttl = 60_000, maxSize = 10_000, now = Date.now } = options

  // Map keeps insertion order; re-inserting on set() moves a key to the end.
  const entries = new Map<string, { value: T; updatedAt: number }>()
  const loading = new Map<string, Promise<T | null>>()

  function live(key: string): { value: T } | undefined {
    const entry = entries.get(key)
    if (!entry) return undefined
    if (now() - entry.updatedAt >= ttl) {
      entries.delete(key)
      return undefined
    }
    return entry
  }

  function set(key: string, value: T): void {
    entries.delete(key)
    while (entries.size >= maxSize) {
      const oldest = entries.keys().next()
      if (oldest.done) break
      entries.delete(oldest.value)
    }
    entries.set(key, { value, updatedAt: now() })
  }

  return {
    set,

    get(key) {
      return live(key)?.value
    },

    has(key) {
      return live(key) !== undefined
    },

    delete(key) {
      entries.delete(key)
      loading.delete(key)
    },

    size() {
      return entries.size
    },

    clear() {
      entries.clear()
      loading.clear()
    },

    async getOrLoad(key, load) {
      const hit = live(key)
      if (hit) return hit.value

      const pending = loading.get(key)
      if (pending) return pending

      const promise = load().then(
        (value) => {
          // A delete() during the load drops the result instead of caching it.
          if (loading.get(key) === promise) {
            loading.delete(key)
            if (value !== null) set(key, value)
          }
          return value
        },
        (err: unknown) => {
          if (loading.get(key) === promise) loading.delete(key)
          throw err
        },
      )
      loading.set(key, promise)
      return promise
    },
  }
}
