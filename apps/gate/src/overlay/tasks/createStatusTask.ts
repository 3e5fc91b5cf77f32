import type { OverlayTask } from '../types'
import { overlayColors } from '../types'

export type StatusConfig = {
  showFps?: boolean
  pausedText?: string
}

/**
 * Create Status Task
 *
 * FPS in the top-right corner and a pause marker at the bottom.
 */
export const createStatusTask = (config?: StatusConfig): OverlayTask => {
  const showFps = config?.showFps ?? true
  const pausedText = config?.pausedText ?? 'PAUSED'

  return {
    name: 'status',
    execute: ({ canvas, fps, paused }) => {
      if (showFps) {
        canvas.text({
          x: canvas.width - 10,
          y: 28,
          text: `${fps.toFixed(1)} fps`,
          color: overlayColors.text,
          anchor: 'end',
        })
      }

      if (paused) {
        canvas.text({
          x: canvas.width / 2,
          y: canvas.height - 24,
          text: pausedText,
          color: overlayColors.warning,
          fontSize: 28,
          anchor: 'middle',
          bold: true,
        })
      }
    },
  }
}
