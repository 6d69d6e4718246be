/**
 * Event deduplication filter.
 *
 * Remembers recently seen event ids per channel (the router uses the
 * conversation id). `seen(channel, id)` returns `true` for an id already
 * recorded, `false` (and records it) otherwise.
 *
 * Ids are forgotten `windowMs` after they were first seen, and each channel
 * holds at most `maxSize` ids, oldest evicted first.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DedupOptions {
  /**
   * Maximum number of ids remembered per channel.
   * @default 1000
   */
  maxSize?: number
  /**
   * How long an id is remembered, in milliseconds.
   * @default 60000
   */
  windowMs?: number
  /** Clock source in milliseconds. Defaults to `Date.now`. */
  now?: () => number
}

export interface DeduplicationFilter {
  /**
   * Returns `true` if `id` was already seen on `channel` within the window.
   * Returns `false` and records the id otherwise.
   */
  seen(channel: string, id: string): boolean

  /** Number of ids currently remembered for a channel. */
  size(channel: string): number
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createDedup(options: DedupOptions = {}): DeduplicationFilter {
  const { maxSize = 1000, windowMs = 60_000, now = Date.now } = options
  // channel → (id → first-seen time). Map iteration order is insertion
  // order, so the first entry is always the oldest.
  const channels = new Map<string, Map<string, number>>()
  let lastSweep = now()

  function expire(ids: Map<string, number>, at: number): void {
    for (const [id, seenAt] of ids) {
      if (at - seenAt < windowMs) break
      ids.delete(id)
    }
  }

  // Drop channels that have gone quiet so the outer map stays bounded.
  function sweep(at: number): void {
    if (at - lastSweep < windowMs) return
    lastSweep = at
    for (const [channel, ids] of channels) {
      expire(ids, at)
      if (ids.size === 0) channels.delete(channel)
    }
  }

  return {
    seen(channel, id) {
      const at = now()
      sweep(at)

      let ids = channels.get(channel)
      if (!ids) {
        ids = new Map()
        channels.set(channel, ids)
      }
      expire(ids, at)
      if (ids.has(id)) return true

      while (ids.size >= maxSize) {
        const oldest = ids.keys().next()
        if (oldest.done) break
        ids.delete(oldest.value)
      }
      ids.set(id, at)
      return false
    },

    size(channel) {
      const ids = channels.get(channel)
      if (!ids) return 0
      expire(ids, now())
      return ids.size
    },
  }
}
