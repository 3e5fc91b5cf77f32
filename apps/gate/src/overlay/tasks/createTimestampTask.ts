import type { OverlayTask } from '../types'
import { overlayColors } from '../types'

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export const formatTimestamp = (at: Date) =>
  `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} ` +
  `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`

export type TimestampConfig = {
  fontSize?: number
}

/**
 * Create Timestamp Task
 *
 * Wall-clock time in the top-left corner of every frame.
 */
export const createTimestampTask = (config?: TimestampConfig): OverlayTask => {
  const fontSize = config?.fontSize ?? 18

  return {
    name: 'timestamp',
    execute: ({ canvas, now }) => {
      canvas.text({
        x: 10,
        y: 10 + fontSize,
        text: formatTimestamp(now),
        color: overlayColors.text,
        fontSize,
      })
    },
  }
}
