/**
 * ffplay Display
 *
 * Pipes composed RGB24 frames into an ffplay window. The window size is
 * fixed at start; ffplay scales each frame into it. A frame is dropped
 * whenever the pipe is still draining the previous one.
 */

import { errorMeta } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { spawnChild, waitForExit } from '../capture/childProcess'
import type { Spawner } from '../capture/childProcess'
import type { DisplaySink } from './types'

export type FfplayDisplayOptions = {
  width: number
  height: number
  /** Window edge in pixels */
  windowSize: number
  title: string
  logger: Logger
  /** The viewer exited on its own (window closed) */
  onClosed?: () => void
  spawner?: Spawner
  command?: string
}

export const ffplayArgs = ({
  width,
  height,
  windowSize,
  title,
}: Pick<FfplayDisplayOptions, 'width' | 'height' | 'windowSize' | 'title'>) => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  'rawvideo',
  '-pixel_format',
  'rgb24',
  '-video_size',
  `${width}x${height}`,
  '-x',
  String(windowSize),
  '-y',
  String(windowSize),
  '-window_title',
  title,
  '-i',
  'pipe:0',
]

export function createFfplayDisplay(options: FfplayDisplayOptions): DisplaySink {
  const { width, height, logger, onClosed, spawner = spawnChild, command = 'ffplay' } = options

  const child = spawner(command, ffplayArgs(options))
  const frameBytes = width * height * 3
  let closed = false
  let closing = false

  child.stdin?.on('error', (error: Error) => {
    // EPIPE once the window is gone; the exit handler reports it
    logger.debug('Display pipe error', errorMeta(error))
  })

  child.onExit((code, error) => {
    closed = true
    if (closing) return
    logger.warn('Display closed', error ? errorMeta(error) : { code })
    onClosed?.()
  })

  return {
    present: (image) => {
      const stdin = child.stdin
      if (closed || !stdin || stdin.destroyed) return false
      if (image.data.length !== frameBytes) {
        logger.warn('Frame size mismatch, dropped', {
          expected: `${width}x${height}`,
          got: `${image.width}x${image.height}`,
        })
        return false
      }
      if (stdin.writableNeedDrain) return false
      stdin.write(image.data)
      return true
    },

    close: async () => {
      if (closed || closing) return
      closing = true
      child.stdin?.end()
      child.kill('SIGTERM')
      if (!(await waitForExit(child, 2000))) child.kill('SIGKILL')
      closed = true
    },

    isClosed: () => closed,
  }
}
