/**
 * Log Policy
 *
 * Decides per evaluated set which recognitions get an audit row. An
 * identity is compared against the identities of the previous non-empty
 * set, not against the previous row:
 *
 * - absent from the previous set: changed, logged at once
 * - present in it: logged again once `cooldownMs` has passed since its
 *   last row
 *
 * An identity appearing twice in one set is logged at most once. Sets
 * without recognitions leave the state untouched.
 */

export type LogPolicyState = {
  lastIdentities: ReadonlyArray<string>
  lastLoggedAt: number | null
}

export type LogPolicy = {
  /** One flag per identity, true where a row should be written */
  decide: (identities: ReadonlyArray<string>, now: number) => Array<boolean>
  getState: () => LogPolicyState
}

export function createLogPolicy(cooldownMs: number): LogPolicy {
  // identity -> time of its last row, for the previous non-empty set
  let previous = new Map<string, number>()
  let lastLoggedAt: number | null = null

  return {
    decide: (identities, now) => {
      if (identities.length === 0) return []

      const current = new Map<string, number>()
      const flags = identities.map((identity) => {
        if (current.has(identity)) return false

        const loggedAt = previous.get(identity)
        if (loggedAt !== undefined && now - loggedAt < cooldownMs) {
          current.set(identity, loggedAt)
          return false
        }

        current.set(identity, now)
        lastLoggedAt = now
        return true
      })

      previous = current
      return flags
    },
    getState: () => ({ lastIdentities: Array.from(previous.keys()), lastLoggedAt }),
  }
}
