/**
 * Bounded per-connection send queue.
 *
 * Frames are written through `write` with at most `window` writes awaiting
 * their completion callback at once; the rest wait in the queue. When more
 * than `capacity` frames are waiting the queue closes itself and calls
 * `onOverflow` once. A slow consumer is dropped, never waited on.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OutboundQueueOptions {
  /** Maximum frames waiting to be written. */
  capacity: number
  /**
   * Maximum writes awaiting completion at once.
   * @default 16
   */
  window?: number
  write: (data: string, done: (err?: Error) => void) => void
  onOverflow: () => void
  /** A write completed with an error. The queue is closed by then. */
  onError: (err: Error) => void
}

export interface OutboundQueue {
  /** Returns `false` when the queue is closed or just overflowed. */
  enqueue(data: string): boolean
  /** Frames waiting to be written. */
  readonly pending: number
  /** Writes awaiting their completion callback. */
  readonly inFlight: number
  readonly closed: boolean
  /** Resolves once nothing is pending or in flight, or the queue closes. */
  drained(): Promise<void>
  /** Stop writing and drop whatever is pending. Returns the dropped count. */
  close(): number
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createOutboundQueue(options: OutboundQueueOptions): OutboundQueue {
  const { capacity, window = 16, write, onOverflow, onError } = options

  const items: string[] = []
  const waiters: Array<() => void> = []
  let inFlight = 0
  let closed = false
  let pumping = false

  function settle(): void {
    if (!closed && (items.length > 0 || inFlight > 0)) return
    for (const resolve of waiters.splice(0)) resolve()
  }

  function close(): number {
    const dropped = items.length
    items.length = 0
    closed = true
    settle()
    return dropped
  }

  function pump(): void {
    // Writes may complete synchronously; the flag keeps that from recursing.
    if (pumping) return
    pumping = true
    try {
      while (!closed && inFlight < window && items.length > 0) {
        const data = items.shift()
        if (data === undefined) break
        inFlight++
        write(data, (err) => {
          inFlight--
          if (err) {
            close()
            onError(err)
            return
          }
          pump()
          settle()
        })
      }
    } finally {
      pumping = false
    }
    settle()
  }

  return {
    enqueue(data) {
      if (closed) return false
      if (items.length >= capacity) {
        close()
        onOverflow()
        return false
      }
      items.push(data)
      pump()
      return true
    },

    get pending() {
      return items.length
    },

    get inFlight() {
      return inFlight
    },

    get closed() {
      return closed
    },

    drained() {
      if (closed || (items.length === 0 && inFlight === 0)) return Promise.resolve()
      return new Promise<void>((resolve) => {
        waiters.push(resolve)
      })
    },

    close,
  }
}
