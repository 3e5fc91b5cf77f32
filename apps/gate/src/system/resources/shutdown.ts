/**
 * Shutdown Resource
 *
 * Owns the process-wide shutdown flag and turns SIGINT/SIGTERM into a
 * request on it.
 */

import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { createShutdown, shutdownReasons } from '../../gate/shutdown'
import type { Shutdown } from '../../gate/shutdown'

export type ShutdownResource = Shutdown & {
  cleanup: () => void
}

export const shutdownResource = defineResource({
  dependencies: ['logger'],
  start: ({ logger }: { logger: Logger }): ShutdownResource => {
    const log = componentLogger(logger, 'Shutdown')
    const shutdown = createShutdown()

    const onSignal = (signal: NodeJS.Signals) => {
      if (!shutdown.request(shutdownReasons.signal, signal)) {
        log.warn('Already shutting down', { signal })
      }
    }

    shutdown.subscribe((request) => {
      if (request) log.info('Shutdown requested', { ...request })
    })

    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)

    return {
      ...shutdown,
      cleanup: () => {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      },
    }
  },
  halt: ({ cleanup }: ShutdownResource) => {
    cleanup()
  },
})
