/**
 * Actuation Resource
 *
 * Wires the UDP actuator, the optional Telegram alert and the CSV audit
 * log into an ActuationController listening on the result cache.
 */

import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { Logger } from '@facegate/system'
import {
  createActuationController,
  createCsvAuditLog,
  createTelegramAlert,
  createUdpActuator,
} from '@facegate/actuation'
import type { ActuationController, ActuatorChannel } from '@facegate/actuation'
import type { ResultCache } from '@facegate/recognition'
import type { GateConfig } from '../../config'
import type { InferenceResource } from './inference'

type ActuationDependencies = {
  logger: Logger
  cache: ResultCache
  inference: InferenceResource
}

export type ActuationResource = {
  controller: ActuationController
  actuator: ActuatorChannel
  detach: () => void
}

export const createActuationResource = (config: GateConfig) =>
  defineResource({
    dependencies: ['logger', 'cache', 'inference'],
    start: ({ logger, cache, inference }: ActuationDependencies): ActuationResource => {
      const telegram = config.alert.telegram
      const actuator = createUdpActuator({
        ...config.actuator,
        logger: componentLogger(logger, 'Actuator'),
      })

      const controller = createActuationController({
        actuator,
        alert: telegram ? createTelegramAlert(telegram) : null,
        audit: createCsvAuditLog({ path: config.audit.path }),
        encodeJpeg: inference.codec.encodeJpeg,
        logger: componentLogger(logger, 'Actuation'),
        alertCooldownMs: config.alert.cooldownMs,
        alertOn: config.alert.on,
        logCooldownMs: config.audit.cooldownMs,
      })

      return {
        controller,
        actuator,
        detach: controller.attach(cache),
      }
    },
    halt: async ({ controller, actuator, detach }: ActuationResource) => {
      detach()
      await controller.close()
      await actuator.close()
    },
  })
