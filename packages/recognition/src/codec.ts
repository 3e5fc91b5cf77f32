/**
 * Frame Codec
 *
 * Pixel work the pipeline needs, behind an interface so the worker and the
 * render loop can be tested without decoding anything.
 *
 * The sharp implementation reads packed RGB24 directly (`raw` input) and
 * converts every failure into EncodeFailureError.
 */

import sharp from 'sharp'
import { EncodeFailureError } from './errors'
import type { CropRegion } from './geometry'
import type { RawImage } from './vocabulary/schemas'

/**
 * Frame resized for detection: raw pixels to crop from, JPEG to submit
 */
export type PreparedImage = {
  raw: RawImage
  jpeg: Buffer
}

export type FrameCodec = {
  /** Downscale to fit `maxSize` x `maxSize` (never enlarges) and encode */
  prepare: (image: RawImage, maxSize: number) => Promise<PreparedImage>
  crop: (image: RawImage, region: CropRegion) => Promise<Buffer>
  encodeJpeg: (image: RawImage) => Promise<Buffer>
  /** Draw an SVG document of the same size over the image */
  composite: (image: RawImage, svg: string) => Promise<RawImage>
}

export type SharpCodecOptions = {
  quality?: number
}

const rawInput = (image: RawImage) =>
  sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  })

const toRawImage = (data: Buffer, info: sharp.OutputInfo): RawImage => {
  if (info.channels !== 3) {
    throw new EncodeFailureError(`Expected 3 channels, got ${info.channels}`)
  }
  return { data, width: info.width, height: info.height, channels: 3 }
}

const encodeFailure = (operation: string) => (error: unknown) => {
  if (error instanceof EncodeFailureError) throw error
  const message = error instanceof Error ? error.message : String(error)
  throw new EncodeFailureError(`${operation} failed: ${message}`, { cause: error })
}

export function createSharpCodec(options: SharpCodecOptions = {}): FrameCodec {
  const { quality = 85 } = options

  const encodeJpeg = (image: RawImage) =>
    rawInput(image).jpeg({ quality }).toBuffer().catch(encodeFailure('encode'))

  return {
    prepare: async (image, maxSize) => {
      try {
        const { data, info } = await rawInput(image)
          .resize({ width: maxSize, height: maxSize, fit: 'inside', withoutEnlargement: true })
          .raw()
          .toBuffer({ resolveWithObject: true })
        const raw = toRawImage(data, info)
        return { raw, jpeg: await encodeJpeg(raw) }
      } catch (error) {
        return encodeFailure('prepare')(error)
      }
    },

    crop: (image, region) =>
      rawInput(image)
        .extract(region)
        .jpeg({ quality })
        .toBuffer()
        .catch(encodeFailure('crop')),

    encodeJpeg,

    composite: async (image, svg) => {
      try {
        const { data, info } = await rawInput(image)
          .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
          .removeAlpha()
          .raw()
          .toBuffer({ resolveWithObject: true })
        return toRawImage(data, info)
      } catch (error) {
        return encodeFailure('composite')(error)
      }
    },
  }
}
