/**
 * Result Cache
 *
 * Holds the most recently completed ResultSet. One writer (the inference
 * worker), any number of readers (render loop, actuation controller).
 *
 * publish() freezes the set and swaps the atom's reference in one
 * assignment; read() returns whichever reference is current and never
 * waits. Readers may lag by a cycle or more.
 */

import { createAtom } from '@facegate/system'
import type { ResultSet } from './vocabulary/schemas'

export type ResultCacheOptions = {
  /**
   * Refuse a set whose frame sequence is older than the cached one.
   * Off by default: the latest completed cycle always wins.
   */
  rejectStale?: boolean
}

export type ResultCache = {
  /** Returns false when the set was refused as stale */
  publish: (set: ResultSet) => boolean
  read: () => ResultSet | null
  /** Called with every accepted set */
  subscribe: (callback: (set: ResultSet) => void) => () => void
  clear: () => void
}

/**
 * Deep-freeze everything but the pixel buffer (typed arrays cannot be frozen)
 */
export const freezeResultSet = (set: ResultSet): ResultSet => {
  for (const recognition of set.recognitions) {
    Object.freeze(recognition.box)
    Object.freeze(recognition.result)
    Object.freeze(recognition)
  }
  Object.freeze(set.recognitions)
  Object.freeze(set.imageSize)
  Object.freeze(set.frame.image)
  Object.freeze(set.frame)
  if (set.error) Object.freeze(set.error)
  return Object.freeze(set)
}

export function createResultCache(options: ResultCacheOptions = {}): ResultCache {
  const { rejectStale = false } = options
  const latest = createAtom<ResultSet | null>(null)

  return {
    publish: (set) => {
      const current = latest.get()
      if (rejectStale && current && set.sequence < current.sequence) {
        return false
      }
      latest.set(freezeResultSet(set))
      return true
    },

    read: () => latest.get(),

    subscribe: (callback) =>
      latest.subscribe((set) => {
        if (set) callback(set)
      }),

    clear: () => {
      latest.clear()
    },
  }
}
