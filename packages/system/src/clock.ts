/**
 * Wall-clock source in epoch milliseconds.
 * Policies and workers take one so tests can drive time by hand.
 */
export type Clock = {
  now: () => number
}

export const systemClock: Clock = {
  now: () => Date.now(),
}

/**
 * Manually advanced clock
 */
export function createManualClock(start = 0) {
  let current = start

  return {
    now: () => current,
    set: (value: number) => {
      current = value
    },
    advance: (deltaMs: number) => {
      current += deltaMs
      return current
    },
  }
}

export type ManualClock = ReturnType<typeof createManualClock>
