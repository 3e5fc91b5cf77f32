/**
 * Enrollment Gate
 *
 * Decides when a detect-only cycle is a good registration sample:
 * exactly one face, no cycle error, target not yet reached, and at least
 * `captureCooldownMs` since the previous sample.
 */

import { systemClock } from '@facegate/system'
import type { Clock } from '@facegate/system'
import type { ResultSet } from './vocabulary/schemas'

export type EnrollmentGateOptions = {
  target: number
  captureCooldownMs?: number
  clock?: Clock
}

export type EnrollmentGate = {
  shouldCapture: (set: ResultSet) => boolean
  /** Count a saved sample. Returns the new total. */
  recordCapture: () => number
  getSaved: () => number
  getTarget: () => number
  isComplete: () => boolean
}

export function createEnrollmentGate(options: EnrollmentGateOptions): EnrollmentGate {
  const { target, captureCooldownMs = 800, clock = systemClock } = options
  let saved = 0
  let lastCapture: number | null = null

  return {
    shouldCapture: (set) => {
      if (set.error) return false
      if (set.recognitions.length !== 1) return false
      if (saved >= target) return false
      return lastCapture === null || clock.now() - lastCapture >= captureCooldownMs
    },

    recordCapture: () => {
      saved += 1
      lastCapture = clock.now()
      return saved
    },

    getSaved: () => saved,
    getTarget: () => target,
    isComplete: () => saved >= target,
  }
}

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * `Amy_20260104_101500_3.jpg`
 */
export const sampleFileName = (userId: string, at: Date, index: number) => {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  return `${userId}_${date}_${time}_${index}.jpg`
}
