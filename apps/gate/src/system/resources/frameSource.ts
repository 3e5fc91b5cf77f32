/**
 * Frame Source Resource
 *
 * Opens the ffmpeg source at start. A source that never yields a first
 * frame fails the system start.
 */

import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { createFfmpegFrameSource } from '../../capture/ffmpegFrameSource'
import type { FrameSource } from '../../capture/types'
import type { GateConfig } from '../../config'

export const createFrameSourceResource = (config: GateConfig['source']) =>
  defineResource({
    dependencies: ['logger'],
    start: async ({ logger }: { logger: Logger }) => {
      const source = createFfmpegFrameSource({
        url: config.url,
        width: config.frameSize,
        height: config.frameSize,
        squareCrop: config.squareCrop,
        logger: componentLogger(logger, 'FrameSource'),
      })
      await source.open()
      return source
    },
    halt: async (source: FrameSource) => {
      await source.close()
    },
  })
