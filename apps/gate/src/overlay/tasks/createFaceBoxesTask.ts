import { formatLabel, isKnown, scaleBox } from '@facegate/recognition'
import type { OverlayTask } from '../types'
import { overlayColors } from '../types'

export type FaceBoxesConfig = {
  strokeWidth?: number
  fontSize?: number
}

/**
 * Create Face Boxes Task
 *
 * One rectangle per recognition of the latest set, green when the face is
 * known and red otherwise, with its label above. Boxes are mapped from the
 * detection image onto the presented frame.
 */
export const createFaceBoxesTask = (config?: FaceBoxesConfig): OverlayTask => {
  const strokeWidth = config?.strokeWidth ?? 2
  const fontSize = config?.fontSize ?? 16

  return {
    name: 'faceBoxes',
    execute: ({ canvas, result }) => {
      if (!result || result.error) return

      for (const { box, result: label } of result.recognitions) {
        const scaled = scaleBox(box, result.imageSize, canvas)
        const color = isKnown(label) ? overlayColors.known : overlayColors.unknown

        canvas.rect({
          x: scaled.xMin,
          y: scaled.yMin,
          width: scaled.xMax - scaled.xMin,
          height: scaled.yMax - scaled.yMin,
          stroke: color,
          strokeWidth,
        })

        // Keep the caption inside the frame for boxes touching the top edge
        canvas.text({
          x: scaled.xMin,
          y: Math.max(scaled.yMin - 8, fontSize),
          text: formatLabel(label),
          color,
          fontSize,
        })
      }
    },
  }
}
