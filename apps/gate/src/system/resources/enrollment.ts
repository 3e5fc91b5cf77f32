/**
 * Enrollment Resource
 *
 * Registers `userId` from detect-only cycles, writes each sample under the
 * images directory and requests shutdown once the target is reached.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { createEnrollmentGate } from '@facegate/recognition'
import type { ResultCache } from '@facegate/recognition'
import { createEnrollmentSession } from '../../gate/enrollmentSession'
import type { EnrollmentSession } from '../../gate/enrollmentSession'
import type { GateLoop } from '../../gate/gateLoop'
import { shutdownReasons } from '../../gate/shutdown'
import { enrollOverlayTasks } from '../../overlay'
import type { InferenceResource } from './inference'
import type { ShutdownResource } from './shutdown'

export type EnrollmentOptions = {
  userId: string
  samples: number
  imagesDir: string
}

type EnrollmentDependencies = {
  logger: Logger
  cache: ResultCache
  inference: InferenceResource
  loop: GateLoop
  shutdown: ShutdownResource
}

export type EnrollmentResource = {
  session: EnrollmentSession
  cleanup: () => void
}

export const createEnrollmentResource = (options: EnrollmentOptions) =>
  defineResource({
    dependencies: ['logger', 'cache', 'inference', 'loop', 'shutdown'],
    start: async ({
      logger,
      cache,
      inference,
      loop,
      shutdown,
    }: EnrollmentDependencies): Promise<EnrollmentResource> => {
      const { userId, samples, imagesDir } = options
      await mkdir(imagesDir, { recursive: true })

      const session = createEnrollmentSession({
        userId,
        gate: createEnrollmentGate({ target: samples }),
        encodeJpeg: inference.codec.encodeJpeg,
        saveSample: async (fileName, jpeg) => {
          const samplePath = path.join(imagesDir, fileName)
          await writeFile(samplePath, jpeg)
          return samplePath
        },
        register: inference.client.register,
        logger: componentLogger(logger, 'Enrollment'),
        onComplete: (saved) => {
          shutdown.request(shutdownReasons.enrollmentComplete, `${saved} samples`)
        },
      })

      const detach = session.attach(cache)
      const removals = enrollOverlayTasks(() => session.getProgress()).map((task) =>
        loop.addOverlayTask(task),
      )

      return {
        session,
        cleanup: () => {
          detach()
          removals.forEach((remove) => remove())
        },
      }
    },
    halt: async ({ session, cleanup }: EnrollmentResource) => {
      cleanup()
      // Pending saves and registrations finish before the process exits
      await session.close()
    },
  })
