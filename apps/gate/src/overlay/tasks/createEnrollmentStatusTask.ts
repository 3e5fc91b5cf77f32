import type { EnrollmentProgress } from '../../gate/enrollmentSession'
import type { OverlayTask } from '../types'
import { overlayColors } from '../types'

export const enrollmentMessages = {
  oneFace: 'OK: 1 face detected (auto capture soon)',
  notOneFace: 'Show ONLY ONE face clearly!',
  detectError: (message: string) => `Detect error: ${message}`,
  progress: ({ userId, saved, target }: EnrollmentProgress) =>
    `Registering ${userId}: ${saved}/${target}`,
} as const

/**
 * Create Enrollment Status Task
 *
 * Guidance line for the person being registered, from the latest
 * detect-only set, plus the sample count.
 */
export const createEnrollmentStatusTask = (
  getProgress: () => EnrollmentProgress,
): OverlayTask => ({
  name: 'enrollmentStatus',
  execute: ({ canvas, result }) => {
    const guidance = (() => {
      if (!result) return null
      if (result.error) {
        return { text: enrollmentMessages.detectError(result.error.message), color: overlayColors.unknown }
      }
      if (result.recognitions.length !== 1) {
        return { text: enrollmentMessages.notOneFace, color: overlayColors.unknown }
      }
      return { text: enrollmentMessages.oneFace, color: overlayColors.known }
    })()

    if (guidance) {
      canvas.text({ x: 10, y: 56, text: guidance.text, color: guidance.color, fontSize: 18 })
    }

    canvas.text({
      x: 10,
      y: canvas.height - 16,
      text: enrollmentMessages.progress(getProgress()),
      color: overlayColors.text,
      fontSize: 18,
    })
  },
})
