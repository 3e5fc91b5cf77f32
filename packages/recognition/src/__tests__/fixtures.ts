import { vi } from 'vitest'
import { createLogger } from '@facegate/system'
import type {
  DetectionBox,
  FrameCodec,
  Frame,
  InferenceClient,
  RawImage,
  Recognition,
  ResultSet,
} from '@facegate/recognition'

export const silentLogger = createLogger({ silent: true })

export const makeImage = (width = 640, height = 640): RawImage => ({
  data: Buffer.alloc(width * height * 3),
  width,
  height,
  channels: 3,
})

export const makeFrame = (sequence = 1, image: RawImage = makeImage()): Frame => ({
  sequence,
  image,
  capturedAt: 1000 + sequence,
})

export const box = (xMin: number, yMin: number, xMax: number, yMax: number): DetectionBox => ({
  xMin,
  yMin,
  xMax,
  yMax,
})

export const makeResultSet = (
  sequence: number,
  recognitions: Array<Recognition> = [],
  error: ResultSet['error'] = null,
): ResultSet => ({
  sequence,
  frame: makeFrame(sequence),
  imageSize: { width: 640, height: 640 },
  recognitions,
  error,
  completedAt: 2000 + sequence,
})

/**
 * Codec that never touches pixels: prepare passes the image through
 */
export const createFakeCodec = () => ({
  prepare: vi.fn<FrameCodec['prepare']>(async (image) => ({
    raw: image,
    jpeg: Buffer.from('prepared'),
  })),
  crop: vi.fn<FrameCodec['crop']>(async () => Buffer.from('crop')),
  encodeJpeg: vi.fn<FrameCodec['encodeJpeg']>(async () => Buffer.from('jpeg')),
  composite: vi.fn<FrameCodec['composite']>(async (image) => image),
})

export const createFakeClient = () => ({
  detect: vi.fn<InferenceClient['detect']>(async () => []),
  recognize: vi.fn<InferenceClient['recognize']>(async () => []),
  register: vi.fn<InferenceClient['register']>(async () => {}),
})
