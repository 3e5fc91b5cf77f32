/**
 * Recognition Schemas
 *
 * Two groups:
 * 1. Wire schemas - what the inference service returns (validated with zod)
 * 2. Pipeline types - what flows from the worker to the cache and its readers
 */

import { z } from 'zod'
import type { ErrorKind } from './keywords'

// ============================================================================
// Wire Schemas
// ============================================================================

const probability = z.number().min(0).max(1)

/**
 * Face found by `vision/face`, in pixels of the submitted image
 */
export const detectedFaceSchema = z.object({
  x_min: z.number(),
  y_min: z.number(),
  x_max: z.number(),
  y_max: z.number(),
  confidence: probability.optional(),
})

export const detectResponseSchema = z.object({
  success: z.boolean().optional(),
  predictions: z.array(detectedFaceSchema).default([]),
  error: z.string().optional(),
})

/**
 * Candidate returned by `vision/face/recognize`. Older service builds
 * report `score` instead of `confidence`.
 */
export const recognizedFaceSchema = z.object({
  userid: z.string().optional(),
  confidence: probability.optional(),
  score: probability.optional(),
})

export const recognizeResponseSchema = z.object({
  success: z.boolean().optional(),
  predictions: z.array(recognizedFaceSchema).default([]),
  error: z.string().optional(),
})

export const registerResponseSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  error: z.string().optional(),
})

// ============================================================================
// Pipeline Types
// ============================================================================

/**
 * Axis-aligned box in pixels of the image submitted for detection
 */
export type DetectionBox = {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

/**
 * Label for one box. `identity` is 'Unknown' when not recognised,
 * `confidence` is in [0, 1].
 */
export type RecognitionResult = {
  identity: string
  confidence: number
}

/**
 * Ranked candidate after normalising the wire format
 */
export type RecognitionCandidate = {
  userId: string
  confidence: number
}

/**
 * Packed RGB24 pixels
 */
export type RawImage = {
  data: Buffer
  width: number
  height: number
  channels: 3
}

export type ImageSize = {
  width: number
  height: number
}

export type Frame = {
  /** Monotonic per source */
  sequence: number
  image: RawImage
  /** Epoch ms */
  capturedAt: number
}

export type Recognition = {
  box: DetectionBox
  result: RecognitionResult
}

export type CycleError = {
  kind: ErrorKind
  message: string
}

/**
 * Outcome of one inference cycle. Published frozen; never mutated.
 */
export type ResultSet = {
  /** Sequence of the frame that produced it */
  readonly sequence: number
  readonly frame: Frame
  /** Size of the image submitted for detection; boxes live in this space */
  readonly imageSize: ImageSize
  readonly recognitions: ReadonlyArray<Recognition>
  readonly error: CycleError | null
  readonly completedAt: number
}
