/**
 * Frame Handoff
 *
 * Single-slot, latest-wins buffer between a producer that must never block
 * (the capture loop) and one consumer that works at its own pace (the
 * inference worker).
 *
 * - offer() never waits. An unconsumed item is evicted and replaced.
 * - take() returns at once when an item is waiting, otherwise it parks
 *   until the next offer() or until the timeout elapses.
 * - An item is handed out at most once.
 *
 * One consumer only: a second concurrent take() throws.
 */

export type FrameHandoff<T> = {
  /**
   * Place an item in the slot. Returns true when an older, unconsumed item
   * was evicted. Ignored once closed.
   */
  offer: (item: T) => boolean

  /**
   * Consume the slot, waiting up to `timeoutMs` for an item.
   * Resolves null on timeout or when the handoff is closed.
   */
  take: (timeoutMs: number) => Promise<T | null>

  /**
   * Release a parked consumer with null and refuse further offers
   */
  close: () => void

  isClosed: () => boolean
  hasPending: () => boolean
  getDroppedCount: () => number
}

type Waiter<T> = {
  resolve: (item: T | null) => void
  timer: ReturnType<typeof setTimeout>
}

export function createFrameHandoff<T>(): FrameHandoff<T> {
  let slot: { item: T } | null = null
  let waiter: Waiter<T> | null = null
  let closed = false
  let dropped = 0

  const release = (item: T | null) => {
    if (!waiter) return
    const { resolve, timer } = waiter
    waiter = null
    clearTimeout(timer)
    resolve(item)
  }

  return {
    offer: (item) => {
      if (closed) return false

      // A parked consumer gets the item directly; the slot stays empty
      if (waiter) {
        release(item)
        return false
      }

      const evicted = slot !== null
      if (evicted) dropped += 1
      slot = { item }
      return evicted
    },

    take: (timeoutMs) => {
      if (waiter) {
        return Promise.reject(
          new Error('[FrameHandoff] take() called while another take() is pending'),
        )
      }

      if (slot) {
        const { item } = slot
        slot = null
        return Promise.resolve(item)
      }

      if (closed) return Promise.resolve(null)

      return new Promise<T | null>((resolve) => {
        const timer = setTimeout(() => release(null), Math.max(0, timeoutMs))
        waiter = { resolve, timer }
      })
    },

    close: () => {
      closed = true
      slot = null
      release(null)
    },

    isClosed: () => closed,
    hasPending: () => slot !== null,
    getDroppedCount: () => dropped,
  }
}
