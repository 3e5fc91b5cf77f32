/**
 * Enrollment Session
 *
 * Turns detect-only ResultSets into registration samples for one user.
 * The enrollment gate decides when a set qualifies; this module saves the
 * full frame as JPEG and registers it with the face service, both
 * detached so the cache subscriber never waits.
 */

import { createTaskGroup, errorMeta } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { sampleFileName } from '@facegate/recognition'
import type { EnrollmentGate, RawImage, ResultCache, ResultSet } from '@facegate/recognition'

export type EnrollmentSessionOptions = {
  userId: string
  gate: EnrollmentGate
  encodeJpeg: (image: RawImage) => Promise<Buffer>
  /** Persist one sample. Resolves the path written. */
  saveSample: (fileName: string, jpeg: Buffer) => Promise<string>
  register: (jpeg: Buffer, userId: string) => Promise<void>
  logger: Logger
  /** Called once, when the last sample was taken */
  onComplete?: (saved: number) => void
  now?: () => Date
}

export type EnrollmentProgress = {
  userId: string
  saved: number
  target: number
}

export function createEnrollmentSession(options: EnrollmentSessionOptions) {
  const {
    userId,
    gate,
    encodeJpeg,
    saveSample,
    register,
    logger,
    onComplete,
    now = () => new Date(),
  } = options

  const samples = createTaskGroup({
    name: 'samples',
    onError: (error, label) => {
      logger.error(`${label} failed`, errorMeta(error))
    },
  })

  const capture = (set: ResultSet, index: number) => async () => {
    const jpeg = await encodeJpeg(set.frame.image)
    const path = await saveSample(sampleFileName(userId, now(), index), jpeg)
    logger.info('Sample saved', { path, index })

    await register(jpeg, userId)
    logger.info('Sample registered', { userId, index })
  }

  const handle = (set: ResultSet): boolean => {
    if (!gate.shouldCapture(set)) return false

    // Counted now so the cooldown and target hold for the next set
    const index = gate.recordCapture()
    samples.spawn(`sample ${index}`, capture(set, index))

    if (gate.isComplete()) {
      logger.info('Enrollment complete', { userId, saved: gate.getSaved() })
      onComplete?.(gate.getSaved())
    }
    return true
  }

  return {
    handle,
    attach: (cache: ResultCache) => cache.subscribe((set) => {
        handle(set)
      }),
    getProgress: (): EnrollmentProgress => ({
      userId,
      saved: gate.getSaved(),
      target: gate.getTarget(),
    }),
    drain: () => samples.drain(),
    close: () => samples.close(),
  }
}

export type EnrollmentSession = ReturnType<typeof createEnrollmentSession>
