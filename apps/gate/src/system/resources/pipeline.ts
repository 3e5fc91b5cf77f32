/**
 * Pipeline Resources
 *
 * The two hand-off points between the loops: the frame handoff (render ->
 * worker) and the result cache (worker -> render, actuation, enrollment).
 */

import { defineResource } from 'braided'
import { createFrameHandoff } from '@facegate/system'
import type { FrameHandoff } from '@facegate/system'
import { createResultCache } from '@facegate/recognition'
import type { Frame, ResultCache } from '@facegate/recognition'

export const handoffResource = defineResource({
  dependencies: [],
  start: () => createFrameHandoff<Frame>(),
  halt: (handoff: FrameHandoff<Frame>) => {
    handoff.close()
  },
})

export const createCacheResource = (rejectStale: boolean) =>
  defineResource({
    dependencies: [],
    start: () => createResultCache({ rejectStale }),
    halt: (cache: ResultCache) => {
      cache.clear()
    },
  })
