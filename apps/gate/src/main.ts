#!/usr/bin/env tsx
/**
 * Face Gate entry point
 *
 * Loads configuration, starts the braided system for the chosen mode and
 * halts it once something requests shutdown.
 */

import { haltSystem, startSystem } from 'braided'
import { ZodError } from 'zod'
import { componentLogger, createLogger, errorMeta } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { parseCommand, usage } from './cli'
import type { GateCommand } from './cli'
import { loadConfig } from './config'
import type { GateConfig } from './config'
import { createEnrollSystemConfig, createGateSystemConfig } from './system/system'

const reportStartErrors = (log: Logger, errors: ReadonlyMap<string, Error>) => {
  errors.forEach((error, resource) => {
    log.error('Resource failed to start', { resource, ...errorMeta(error) })
  })
}

const watch = async (config: GateConfig, log: Logger) => {
  const systemConfig = createGateSystemConfig(config)
  const { system, errors } = await startSystem(systemConfig)

  if (errors.size > 0) {
    reportStartErrors(log, errors)
    await haltSystem(systemConfig, system)
    return 1
  }

  log.info('Watching', { source: config.source.url })
  const request = await system.shutdown.wait()
  log.info('Stopping', { ...request })
  await haltSystem(systemConfig, system)
  return 0
}

const enroll = async (
  config: GateConfig,
  log: Logger,
  enrollment: { userId: string; samples: number },
) => {
  const systemConfig = createEnrollSystemConfig(config, enrollment)
  const { system, errors } = await startSystem(systemConfig)

  if (errors.size > 0) {
    reportStartErrors(log, errors)
    await haltSystem(systemConfig, system)
    return 1
  }

  log.info('Enrolling', enrollment)
  const request = await system.shutdown.wait()
  log.info('Stopping', { ...request })
  await haltSystem(systemConfig, system)
  return 0
}

const run = (command: GateCommand, config: GateConfig, log: Logger) =>
  command.mode === 'enroll'
    ? enroll(config, log, { userId: command.userId, samples: command.samples })
    : watch(config, log)

const main = async () => {
  let command: GateCommand
  let config: GateConfig

  try {
    command = parseCommand(process.argv.slice(2))
    config = loadConfig()
  } catch (error) {
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        console.error(`${issue.path.join('.') || 'argument'}: ${issue.message}`)
      }
      console.error(usage)
      return 2
    }
    throw error
  }

  const log = componentLogger(createLogger({ level: config.logLevel }), 'Main')
  return run(command, config, log)
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('[Main] Fatal:', error)
    process.exit(1)
  },
)
