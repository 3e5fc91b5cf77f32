/**
 * Actuator Policy
 *
 * Edge-triggered: a command is due only when presence differs from the
 * last value sent. State flips as soon as the send is initiated, so a
 * slow or failed send is never repeated.
 */

export type ActuatorPolicy = {
  /** True when a command for `present` must be sent. Records it. */
  decide: (present: boolean) => boolean
  /** Last value sent (or assumed) */
  isOn: () => boolean
}

export function createActuatorPolicy(initial = false): ActuatorPolicy {
  let on = initial

  return {
    decide: (present) => {
      if (present === on) return false
      on = present
      return true
    },
    isOn: () => on,
  }
}
