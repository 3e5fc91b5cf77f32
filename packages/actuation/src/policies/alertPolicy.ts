/**
 * Alert Policy
 *
 * At most one dispatch per cooldown window. The window opens when a
 * dispatch is initiated, whether or not delivery later succeeds.
 */

export type AlertPolicy = {
  /** True (and records `now`) when the cooldown has elapsed */
  tryAcquire: (now: number) => boolean
  getLastDispatch: () => number | null
}

export function createAlertPolicy(cooldownMs: number): AlertPolicy {
  let lastDispatch: number | null = null

  return {
    tryAcquire: (now) => {
      if (lastDispatch !== null && now - lastDispatch <= cooldownMs) return false
      lastDispatch = now
      return true
    },
    getLastDispatch: () => lastDispatch,
  }
}
