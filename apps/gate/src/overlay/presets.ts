import type { EnrollmentProgress } from '../gate/enrollmentSession'
import { createEnrollmentStatusTask } from './tasks/createEnrollmentStatusTask'
import { createErrorBannerTask } from './tasks/createErrorBannerTask'
import { createFaceBoxesTask } from './tasks/createFaceBoxesTask'
import { createStatusTask } from './tasks/createStatusTask'
import { createTimestampTask } from './tasks/createTimestampTask'
import type { OverlayTask } from './types'

/**
 * Watch mode: timestamp, error banner, face boxes, status
 */
export const watchOverlayTasks = (): Array<OverlayTask> => [
  createTimestampTask(),
  createErrorBannerTask(),
  createFaceBoxesTask(),
  createStatusTask(),
]

/**
 * Enroll mode: timestamp and detected boxes under the registration guidance.
 * Detect-only sets label every box Unknown, so boxes draw red.
 */
export const enrollOverlayTasks = (
  getProgress: () => EnrollmentProgress,
): Array<OverlayTask> => [
  createTimestampTask(),
  createFaceBoxesTask(),
  createEnrollmentStatusTask(getProgress),
]
