import { defineResource } from 'braided'
import { createLogger } from '@facegate/system'
import type { LogLevel, Logger } from '@facegate/system'

export const createLoggerResource = (level: LogLevel) =>
  defineResource({
    dependencies: [],
    start: () => createLogger({ level }),
    halt: (logger: Logger) => {
      logger.close()
    },
  })
