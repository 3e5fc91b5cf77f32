/**
 * Actuation Controller
 *
 * Evaluates every freshly published ResultSet once against three
 * independent policies and dispatches their side effects detached:
 *
 * - actuator: `ON` / `OFF` over UDP when presence of a known face flips
 * - alert:    one photo per cooldown window, one in flight at most
 * - audit:    one CSV row per identity change or per log cooldown
 *
 * Evaluation itself is synchronous and never waits on a side effect.
 * Error-flagged sets leave every policy untouched.
 */

import { createTaskGroup, errorMeta, systemClock } from '@facegate/system'
import type { Clock, Logger, TaskGroup } from '@facegate/system'
import { isKnown, statusOf } from '@facegate/recognition'
import type { RawImage, ResultCache, ResultSet } from '@facegate/recognition'
import type { AuditLog } from './audit/types'
import type { ActuatorChannel, AlertChannel } from './channels/types'
import { actuationKeywords, commandFor } from './keywords'
import type { ActuatorCommand, AlertTrigger } from './keywords'
import { createActuatorPolicy } from './policies/actuatorPolicy'
import { createAlertPolicy } from './policies/alertPolicy'
import { createLogPolicy } from './policies/logPolicy'

export type ActuationControllerOptions = {
  actuator: ActuatorChannel
  /** null disables alerts */
  alert: AlertChannel | null
  audit: AuditLog
  /** Encodes the alert photo */
  encodeJpeg: (image: RawImage) => Promise<Buffer>
  logger: Logger
  clock?: Clock
  alertCooldownMs?: number
  alertOn?: AlertTrigger
  alertCaption?: string
  logCooldownMs?: number
}

export type EvaluationSummary = {
  skipped: boolean
  /** Command dispatched by this evaluation, if any */
  actuator: ActuatorCommand | null
  alert: boolean
  rowsQueued: number
}

export type ControllerState = {
  actuator: ActuatorCommand
  lastAlertAt: number | null
  lastLoggedIdentities: ReadonlyArray<string>
  lastLoggedAt: number | null
}

export type ActuationController = {
  evaluate: (set: ResultSet) => EvaluationSummary
  /** Evaluate every set the cache publishes. Returns the unsubscribe. */
  attach: (cache: ResultCache) => () => void
  /** Wait for every in-flight side effect */
  drain: () => Promise<void>
  /** Refuse new side effects, then drain */
  close: () => Promise<void>
  getState: () => ControllerState
}

const alertPredicates: Record<AlertTrigger, (set: ResultSet) => boolean> = {
  unknown: (set) => set.recognitions.some(({ result }) => !isKnown(result)),
  recognized: (set) => set.recognitions.some(({ result }) => isKnown(result)),
  any: (set) => set.recognitions.length > 0,
}

const skippedSummary: EvaluationSummary = {
  skipped: true,
  actuator: null,
  alert: false,
  rowsQueued: 0,
}

export function createActuationController(
  options: ActuationControllerOptions,
): ActuationController {
  const {
    actuator,
    alert,
    audit,
    encodeJpeg,
    logger,
    clock = systemClock,
    alertCooldownMs = 15_000,
    alertOn = actuationKeywords.alertTriggers.unknown,
    alertCaption = actuationKeywords.defaultAlertCaption,
    logCooldownMs = 3000,
  } = options

  const actuatorPolicy = createActuatorPolicy(false)
  const alertPolicy = createAlertPolicy(alertCooldownMs)
  const logPolicy = createLogPolicy(logCooldownMs)

  const reportTo = (group: string) => (error: Error, label: string) => {
    logger.error(`${label} failed`, { group, ...errorMeta(error) })
  }

  const actuatorGroup = createTaskGroup({ name: 'actuator', onError: reportTo('actuator') })
  const alertGroup = createTaskGroup({ name: 'alert', limit: 1, onError: reportTo('alert') })
  const logGroup = createTaskGroup({ name: 'log', onError: reportTo('log') })
  const groups: Array<TaskGroup> = [actuatorGroup, alertGroup, logGroup]

  const dispatchActuator = (present: boolean): ActuatorCommand | null => {
    if (!actuatorPolicy.decide(present)) return null
    const command = commandFor(present)
    actuatorGroup.spawn(`actuator ${command}`, async () => {
      await actuator.send(command)
      logger.info('Actuator command sent', { command })
    })
    return command
  }

  const dispatchAlert = (set: ResultSet, now: number): boolean => {
    if (!alert || !alertPredicates[alertOn](set)) return false
    if (alertGroup.isFull()) return false
    if (!alertPolicy.tryAcquire(now)) return false

    return alertGroup.spawn('alert', async () => {
      const photo = await encodeJpeg(set.frame.image)
      await alert.send(photo, alertCaption)
      logger.info('Alert sent', { sequence: set.sequence })
    })
  }

  const queueRows = (set: ResultSet, now: number): number => {
    const actuatorState = commandFor(actuatorPolicy.isOn())
    let queued = 0

    const flags = logPolicy.decide(
      set.recognitions.map(({ result }) => result.identity),
      now,
    )

    set.recognitions.forEach(({ result }, index) => {
      if (!flags[index]) return
      queued += 1
      const entry = {
        timestamp: now,
        identity: result.identity,
        confidence: result.confidence,
        status: statusOf(result),
        actuatorState,
      }
      logGroup.spawn(`audit ${result.identity}`, async () => {
        const row = await audit.append(entry)
        logger.debug('Audit row written', { sequence: row.sequence, identity: row.identity })
      })
    })
    return queued
  }

  const evaluate = (set: ResultSet): EvaluationSummary => {
    if (set.error) return skippedSummary

    const now = clock.now()
    const present = set.recognitions.some(({ result }) => isKnown(result))

    return {
      skipped: false,
      actuator: dispatchActuator(present),
      alert: dispatchAlert(set, now),
      rowsQueued: queueRows(set, now),
    }
  }

  if (!alert) {
    logger.warn('Alert channel not configured, alerts disabled')
  }

  return {
    evaluate,

    attach: (cache) =>
      cache.subscribe((set) => {
        evaluate(set)
      }),

    drain: async () => {
      await Promise.all(groups.map((group) => group.drain()))
    },

    close: async () => {
      await Promise.all(groups.map((group) => group.close()))
    },

    getState: () => {
      const { lastIdentities, lastLoggedAt } = logPolicy.getState()
      return {
        actuator: commandFor(actuatorPolicy.isOn()),
        lastAlertAt: alertPolicy.getLastDispatch(),
        lastLoggedIdentities: lastIdentities,
        lastLoggedAt,
      }
    },
  }
}
