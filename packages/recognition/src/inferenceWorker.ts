/**
 * Inference Worker
 *
 * Background loop between the frame handoff and the result cache:
 *
 *   take() -> prepare -> detect -> (crop -> recognize) per box -> publish
 *
 * One cycle at a time; the next take() happens only after the current
 * cycle published (or skipped). Remote failures never leave this module:
 * - detect failure  -> error-flagged set with no recognitions
 * - recognize/crop failure -> that box is labelled Unknown
 * - prepare failure -> cycle skipped, previous set stays cached
 */

import { errorMeta, systemClock } from '@facegate/system'
import type { Clock, FrameHandoff, Logger } from '@facegate/system'
import type { FrameCodec, PreparedImage } from './codec'
import { toCycleError, toRecognitionError } from './errors'
import { clampBox, paddedCropRegion } from './geometry'
import type { InferenceClient } from './inferenceClient'
import { labelCandidates, unknownResult } from './labelling'
import type { ResultCache } from './resultCache'
import type {
  CycleError,
  DetectionBox,
  Frame,
  Recognition,
  RecognitionResult,
  ResultSet,
} from './vocabulary/schemas'

export type InferenceWorkerOptions = {
  handoff: FrameHandoff<Frame>
  client: InferenceClient
  codec: FrameCodec
  cache: ResultCache
  logger: Logger
  clock?: Clock
  /** Longest side of the image submitted for detection */
  detectSize?: number
  padding?: number
  minCropWidth?: number
  minConfidence?: number
  pollIntervalMs?: number
  /** false: detect only, every box labelled Unknown */
  recognize?: boolean
}

export type WorkerStats = {
  cyclesCompleted: number
  cyclesFailed: number
  cyclesSkipped: number
  lastCycleMs: number | null
}

export type InferenceWorker = {
  start: () => void
  /** Resolves once the loop exited, after the in-flight cycle */
  stop: () => Promise<void>
  isRunning: () => boolean
  /** Run one cycle for `frame`. Resolves the published set, or null if skipped. */
  runCycle: (frame: Frame) => Promise<ResultSet | null>
  getStats: () => WorkerStats
}

export function createInferenceWorker(options: InferenceWorkerOptions): InferenceWorker {
  const {
    handoff,
    client,
    codec,
    cache,
    logger,
    clock = systemClock,
    detectSize = 640,
    padding = 20,
    minCropWidth = 40,
    minConfidence = 0.6,
    pollIntervalMs = 100,
    recognize = true,
  } = options

  const stats: WorkerStats = {
    cyclesCompleted: 0,
    cyclesFailed: 0,
    cyclesSkipped: 0,
    lastCycleMs: null,
  }

  let running = false
  let loopPromise: Promise<void> | null = null

  const recognizeBox = async (
    prepared: PreparedImage,
    box: DetectionBox,
  ): Promise<RecognitionResult> => {
    if (!recognize) return unknownResult(0)

    const region = paddedCropRegion(box, prepared.raw, padding)
    if (!region || region.width < minCropWidth) return unknownResult(0)

    try {
      const crop = await codec.crop(prepared.raw, region)
      const candidates = await client.recognize(crop, minConfidence)
      return labelCandidates(candidates, minConfidence)
    } catch (error) {
      const { kind, message } = toRecognitionError(error)
      logger.warn('Recognize failed, labelling Unknown', { kind, message })
      return unknownResult(0)
    }
  }

  const publish = (
    frame: Frame,
    prepared: PreparedImage,
    recognitions: Array<Recognition>,
    error: CycleError | null,
  ): ResultSet => {
    const set: ResultSet = {
      sequence: frame.sequence,
      frame,
      imageSize: { width: prepared.raw.width, height: prepared.raw.height },
      recognitions,
      error,
      completedAt: clock.now(),
    }
    if (!cache.publish(set)) {
      logger.debug('Stale result refused', { sequence: set.sequence })
    }
    return set
  }

  const cycle = async (frame: Frame): Promise<ResultSet | null> => {
    let prepared: PreparedImage
    try {
      prepared = await codec.prepare(frame.image, detectSize)
    } catch (error) {
      stats.cyclesSkipped += 1
      logger.warn('Prepare failed, skipping cycle', {
        sequence: frame.sequence,
        ...errorMeta(error),
      })
      return null
    }

    let boxes: Array<DetectionBox>
    try {
      boxes = await client.detect(prepared.jpeg)
    } catch (error) {
      const failure = toCycleError(error)
      stats.cyclesFailed += 1
      logger.warn('Detect failed', { sequence: frame.sequence, ...failure })
      return publish(frame, prepared, [], failure)
    }

    const recognitions: Array<Recognition> = []
    for (const detected of boxes) {
      const box = clampBox(detected, prepared.raw)
      recognitions.push({ box, result: await recognizeBox(prepared, box) })
    }

    stats.cyclesCompleted += 1
    logger.debug('Cycle complete', {
      sequence: frame.sequence,
      faces: recognitions.length,
    })
    return publish(frame, prepared, recognitions, null)
  }

  const runCycle = async (frame: Frame) => {
    const startedAt = clock.now()
    try {
      return await cycle(frame)
    } catch (error) {
      logger.error('Unexpected cycle failure', errorMeta(error))
      return null
    } finally {
      stats.lastCycleMs = clock.now() - startedAt
    }
  }

  const loop = async () => {
    while (running && !handoff.isClosed()) {
      const frame = await handoff.take(pollIntervalMs)
      if (frame && running) await runCycle(frame)
    }
    running = false
  }

  return {
    start: () => {
      if (running) return
      running = true
      logger.info('Worker started', { detectSize, recognize })
      loopPromise = loop().catch((error: unknown) => {
        running = false
        logger.error('Worker loop exited', errorMeta(error))
      })
    },

    stop: async () => {
      running = false
      if (loopPromise) {
        await loopPromise
        loopPromise = null
      }
    },

    isRunning: () => running,
    runCycle,
    getStats: () => ({ ...stats }),
  }
}
