import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { Logger } from '@facegate/system'
import type { GateConfig } from '../../config'
import { createFfplayDisplay } from '../../display/ffplayDisplay'
import { createHeadlessDisplay } from '../../display/headlessDisplay'
import type { DisplaySink } from '../../display/types'
import { shutdownReasons } from '../../gate/shutdown'
import type { ShutdownResource } from './shutdown'

/**
 * Display Resource
 *
 * ffplay window sized to the frame, or a sink that discards frames.
 * Closing the window requests shutdown.
 */
export const createDisplayResource = (config: GateConfig, title: string) =>
  defineResource({
    dependencies: ['logger', 'shutdown'],
    start: ({ logger, shutdown }: { logger: Logger; shutdown: ShutdownResource }) => {
      const log = componentLogger(logger, 'Display')

      if (config.display.mode === 'headless') {
        log.info('Headless mode, frames are not shown')
        return createHeadlessDisplay()
      }

      return createFfplayDisplay({
        width: config.source.frameSize,
        height: config.source.frameSize,
        windowSize: config.display.size,
        title,
        logger: log,
        onClosed: () => {
          shutdown.request(shutdownReasons.displayClosed)
        },
      })
    },
    halt: async (display: DisplaySink) => {
      await display.close()
    },
  })
