import type { DetectionBox, ImageSize } from './vocabulary/schemas'

/**
 * Pixel region for sharp's extract()
 */
export type CropRegion = {
  left: number
  top: number
  width: number
  height: number
}

const clamp = (value: number, min: number, max: number) =>
  Math.min(Math.max(value, min), max)

/**
 * Clamp a detected box to the image it was detected on
 */
export const clampBox = (box: DetectionBox, size: ImageSize): DetectionBox => ({
  xMin: clamp(box.xMin, 0, size.width),
  yMin: clamp(box.yMin, 0, size.height),
  xMax: clamp(box.xMax, 0, size.width),
  yMax: clamp(box.yMax, 0, size.height),
})

/**
 * Grow a box by `padding` on every side, clamped to the image.
 * Null when nothing is left to crop.
 */
export function paddedCropRegion(
  box: DetectionBox,
  size: ImageSize,
  padding: number,
): CropRegion | null {
  const left = clamp(Math.floor(box.xMin - padding), 0, size.width)
  const top = clamp(Math.floor(box.yMin - padding), 0, size.height)
  const right = clamp(Math.ceil(box.xMax + padding), 0, size.width)
  const bottom = clamp(Math.ceil(box.yMax + padding), 0, size.height)

  const width = right - left
  const height = bottom - top
  if (width <= 0 || height <= 0) return null

  return { left, top, width, height }
}

/**
 * Map a box from the detection image onto a target of another size
 */
export const scaleBox = (
  box: DetectionBox,
  from: ImageSize,
  to: ImageSize,
): DetectionBox => {
  const sx = from.width > 0 ? to.width / from.width : 1
  const sy = from.height > 0 ? to.height / from.height : 1
  return {
    xMin: box.xMin * sx,
    yMin: box.yMin * sy,
    xMax: box.xMax * sx,
    yMax: box.yMax * sy,
  }
}
