/**
 * Shutdown Coordinator
 *
 * One place every part of the app can ask the process to stop. The first
 * request wins; later ones are logged and ignored. main() awaits wait()
 * and then halts the system in reverse dependency order.
 */

import { createAtom } from '@facegate/system'

export const shutdownReasons = {
  signal: 'signal',
  quit: 'quit',
  enrollmentComplete: 'enrollment-complete',
  sourceClosed: 'source-closed',
  displayClosed: 'display-closed',
} as const

export type ShutdownReason = (typeof shutdownReasons)[keyof typeof shutdownReasons]

export type ShutdownRequest = {
  reason: ShutdownReason
  detail?: string
}

export function createShutdown() {
  const requested = createAtom<ShutdownRequest | null>(null)

  let resolveWait: (request: ShutdownRequest) => void = () => {}
  const waiting = new Promise<ShutdownRequest>((resolve) => {
    resolveWait = resolve
  })

  return {
    /** Returns false when a shutdown was already requested */
    request: (reason: ShutdownReason, detail?: string): boolean => {
      if (requested.get()) return false
      const request = detail === undefined ? { reason } : { reason, detail }
      requested.set(request)
      resolveWait(request)
      return true
    },

    isRequested: () => requested.get() !== null,
    getRequest: () => requested.get(),
    wait: () => waiting,
    subscribe: (callback: (request: ShutdownRequest | null) => void) =>
      requested.subscribe(callback),
  }
}

export type Shutdown = ReturnType<typeof createShutdown>
