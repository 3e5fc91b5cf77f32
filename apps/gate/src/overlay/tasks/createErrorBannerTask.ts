import type { OverlayTask } from '../types'
import { overlayColors } from '../types'

/**
 * Create Error Banner Task
 *
 * Shows the failure of the latest cycle below the timestamp.
 */
export const createErrorBannerTask = (): OverlayTask => ({
  name: 'errorBanner',
  execute: ({ canvas, result }) => {
    if (!result?.error) return
    canvas.text({
      x: 10,
      y: 56,
      text: `Error: ${result.error.message}`,
      color: overlayColors.unknown,
      fontSize: 16,
    })
  },
})
