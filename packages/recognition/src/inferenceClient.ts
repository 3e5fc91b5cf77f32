/**
 * Inference Client
 *
 * Thin adapter over a CodeProject.AI-compatible face service. Every call is
 * a multipart POST bounded by its own timeout; every failure leaves as a
 * RecognitionError.
 */

import type { z } from 'zod'
import { MalformedResponseError, toRecognitionError } from './errors'
import { recognitionKeywords } from './vocabulary/keywords'
import type { InferenceEndpoint } from './vocabulary/keywords'
import {
  detectResponseSchema,
  recognizeResponseSchema,
  registerResponseSchema,
} from './vocabulary/schemas'
import type { DetectionBox, RecognitionCandidate } from './vocabulary/schemas'

const { endpoints, fields } = recognitionKeywords

export type FetchFn = typeof fetch

export type InferenceClientOptions = {
  /** e.g. http://localhost:32168 */
  baseUrl: string
  detectTimeoutMs: number
  recognizeTimeoutMs: number
  registerTimeoutMs: number
  fetchFn?: FetchFn
}

export type InferenceClient = {
  /** Faces in the submitted JPEG, in its pixel space */
  detect: (jpeg: Buffer) => Promise<Array<DetectionBox>>
  /** Ranked candidates for a face crop */
  recognize: (jpeg: Buffer, minConfidence: number) => Promise<Array<RecognitionCandidate>>
  register: (jpeg: Buffer, userId: string) => Promise<void>
}

type ServiceStatus = { success?: boolean; error?: string }

export function createInferenceClient(options: InferenceClientOptions): InferenceClient {
  const { fetchFn = fetch } = options
  const baseUrl = options.baseUrl.replace(/\/+$/, '')

  const post = async <TSchema extends z.ZodTypeAny>(
    endpoint: InferenceEndpoint,
    jpeg: Buffer,
    extra: Record<string, string>,
    schema: TSchema,
    timeoutMs: number,
  ): Promise<z.infer<TSchema>> => {
    const form = new FormData()
    form.append(fields.image, new Blob([jpeg], { type: 'image/jpeg' }), 'image.jpg')
    for (const [name, value] of Object.entries(extra)) {
      form.append(name, value)
    }

    let body: unknown
    try {
      const response = await fetchFn(`${baseUrl}/v1/${endpoint}`, {
        method: 'POST',
        body: form,
        signal: AbortSignal.timeout(timeoutMs),
      })
      if (!response.ok) {
        throw new MalformedResponseError(`${endpoint} responded ${response.status}`)
      }
      body = await response.json()
    } catch (error) {
      throw toRecognitionError(error)
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw toRecognitionError(parsed.error)
    }
    return parsed.data
  }

  const assertSucceeded = (endpoint: InferenceEndpoint, status: ServiceStatus) => {
    if (status.success === false || status.error) {
      throw new MalformedResponseError(`${endpoint}: ${status.error ?? 'success=false'}`)
    }
  }

  return {
    detect: async (jpeg) => {
      const response = await post(
        endpoints.detect,
        jpeg,
        {},
        detectResponseSchema,
        options.detectTimeoutMs,
      )
      assertSucceeded(endpoints.detect, response)
      return response.predictions.map((face) => ({
        xMin: face.x_min,
        yMin: face.y_min,
        xMax: face.x_max,
        yMax: face.y_max,
      }))
    },

    recognize: async (jpeg, minConfidence) => {
      const response = await post(
        endpoints.recognize,
        jpeg,
        { [fields.minConfidence]: String(minConfidence) },
        recognizeResponseSchema,
        options.recognizeTimeoutMs,
      )
      assertSucceeded(endpoints.recognize, response)
      return response.predictions.map((face) => ({
        userId: face.userid ?? '',
        confidence: face.confidence ?? face.score ?? 0,
      }))
    },

    register: async (jpeg, userId) => {
      const response = await post(
        endpoints.register,
        jpeg,
        { [fields.userId]: userId },
        registerResponseSchema,
        options.registerTimeoutMs,
      )
      assertSucceeded(endpoints.register, response)
    },
  }
}
