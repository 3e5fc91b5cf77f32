/**
 * Logger
 *
 * winston console logger shared by every resource. Resources log through
 * a child carrying their component name, rendered as a `[Component]`
 * prefix:
 *
 *   2026-01-04T10:00:00.000Z info [InferenceWorker] Cycle complete {"boxes":1}
 */

import winston from 'winston'

export type Logger = winston.Logger

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export type LoggerOptions = {
  level?: LogLevel
  /** Drop all output (tests) */
  silent?: boolean
}

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, component, ...meta } = info
  const prefix = typeof component === 'string' ? ` [${component}]` : ''
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
  return `${String(timestamp)} ${level}${prefix} ${String(message)}${rest}`
})

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', silent = false } = options

  return winston.createLogger({
    level,
    silent,
    format: winston.format.combine(
      winston.format.errors({ stack: false }),
      winston.format.timestamp(),
      lineFormat,
    ),
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
  })
}

/**
 * Child logger tagged with a component name
 */
export const componentLogger = (logger: Logger, component: string): Logger =>
  logger.child({ component })

/**
 * Normalise a caught value into log metadata
 */
export const errorMeta = (error: unknown) =>
  error instanceof Error
    ? { error: error.message, name: error.name }
    : { error: String(error) }
