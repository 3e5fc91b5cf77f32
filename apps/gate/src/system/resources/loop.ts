/**
 * Loop Resource
 *
 * Starts the gate loop over the opened source. Other resources add
 * their overlay tasks through `addOverlayTask`.
 */

import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { FrameHandoff, Logger } from '@facegate/system'
import type { Frame, ResultCache } from '@facegate/recognition'
import type { FrameSource } from '../../capture/types'
import type { GateConfig } from '../../config'
import type { DisplaySink } from '../../display/types'
import { createGateLoop } from '../../gate/gateLoop'
import type { GateLoop } from '../../gate/gateLoop'
import { shutdownReasons } from '../../gate/shutdown'
import type { InferenceResource } from './inference'
import type { ShutdownResource } from './shutdown'

type LoopDependencies = {
  logger: Logger
  frameSource: FrameSource
  handoff: FrameHandoff<Frame>
  cache: ResultCache
  display: DisplaySink
  inference: InferenceResource
  shutdown: ShutdownResource
}

export const createLoopResource = (config: GateConfig['source']) =>
  defineResource({
    dependencies: [
      'logger',
      'frameSource',
      'handoff',
      'cache',
      'display',
      'inference',
      'shutdown',
    ],
    start: ({
      logger,
      frameSource,
      handoff,
      cache,
      display,
      inference,
      shutdown,
    }: LoopDependencies) => {
      const loop = createGateLoop({
        source: frameSource,
        handoff,
        cache,
        display,
        composite: inference.codec.composite,
        logger: componentLogger(logger, 'GateLoop'),
        offerEvery: config.offerEvery,
        onFatal: (error) => {
          shutdown.request(shutdownReasons.sourceClosed, error.message)
        },
      })
      loop.start()
      return loop
    },
    halt: async (loop: GateLoop) => {
      await loop.stop()
    },
  })
