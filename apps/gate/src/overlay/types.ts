import type { TaskDefinition } from '@facegate/system'
import type { Frame, ResultSet } from '@facegate/recognition'
import type { OverlayCanvas } from './overlayCanvas'

/**
 * Everything an overlay task may draw from, for one presented frame
 */
export type OverlayContext = {
  canvas: OverlayCanvas
  frame: Frame
  /** Latest published set, possibly from an older frame */
  result: ResultSet | null
  /** Wall-clock time of this tick */
  now: Date
  paused: boolean
  fps: number
}

export type OverlayTask = TaskDefinition<OverlayContext>

export const overlayColors = {
  known: '#00ff00',
  unknown: '#ff0000',
  text: '#ffffff',
  warning: '#ffcc00',
} as const
