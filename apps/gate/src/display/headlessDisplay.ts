import type { DisplaySink } from './types'

/**
 * Discards frames. Used when no window is wanted or available.
 */
export function createHeadlessDisplay(): DisplaySink & { getPresented: () => number } {
  let closed = false
  let presented = 0

  return {
    present: () => {
      if (closed) return false
      presented += 1
      return true
    },
    close: async () => {
      closed = true
    },
    isClosed: () => closed,
    getPresented: () => presented,
  }
}
