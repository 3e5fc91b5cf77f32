/**
 * ffmpeg Frame Source
 *
 * Spawns ffmpeg to decode any URL it can read into packed RGB24 frames on
 * stdout, optionally center-cropped to a square and scaled to
 * `width` x `height`. Only the newest complete frame is kept; a slow
 * reader skips frames instead of queueing them.
 */

import { createSubscription, systemClock } from '@facegate/system'
import type { Clock, Logger } from '@facegate/system'
import { EmptyFrameError, FrameSourceClosedError } from '@facegate/recognition'
import type { Frame } from '@facegate/recognition'
import { spawnChild, waitForExit } from './childProcess'
import type { ChildHandle, Spawner } from './childProcess'
import { createFrameAssembler } from './frameAssembler'
import type { FrameSource } from './types'

export type FfmpegFrameSourceOptions = {
  url: string
  width: number
  height: number
  squareCrop?: boolean
  logger: Logger
  openTimeoutMs?: number
  readTimeoutMs?: number
  clock?: Clock
  spawner?: Spawner
  command?: string
}

type ArgsOptions = Pick<FfmpegFrameSourceOptions, 'url' | 'width' | 'height' | 'squareCrop'>

export const ffmpegArgs = ({ url, width, height, squareCrop = true }: ArgsOptions) => {
  const input = url.startsWith('rtsp://')
    ? ['-rtsp_transport', 'tcp', '-fflags', 'nobuffer', '-flags', 'low_delay']
    : []
  const filters = [
    ...(squareCrop ? ["crop='min(iw,ih)':'min(iw,ih)'"] : []),
    `scale=${width}:${height}`,
  ]

  return [
    '-hide_banner',
    '-loglevel',
    'error',
    ...input,
    '-i',
    url,
    '-an',
    '-vf',
    filters.join(','),
    '-pix_fmt',
    'rgb24',
    '-f',
    'rawvideo',
    'pipe:1',
  ]
}

export function createFfmpegFrameSource(options: FfmpegFrameSourceOptions): FrameSource {
  const {
    width,
    height,
    logger,
    openTimeoutMs = 10_000,
    readTimeoutMs = 2000,
    clock = systemClock,
    spawner = spawnChild,
    command = 'ffmpeg',
  } = options

  const assembler = createFrameAssembler(width * height * 3)
  const frame$ = createSubscription<Frame>()
  const closed$ = createSubscription<FrameSourceClosedError>()

  let child: ChildHandle | null = null
  let closing = false
  let closedError: FrameSourceClosedError | null = null
  let latest: Frame | null = null
  let lastRead = 0
  let sequence = 0

  const accept = (data: Buffer) => {
    sequence += 1
    latest = {
      sequence,
      image: { data, width, height, channels: 3 },
      capturedAt: clock.now(),
    }
    frame$.notify(latest)
  }

  const markClosed = (reason: string) => {
    if (closedError) return
    closedError = new FrameSourceClosedError(reason)
    closed$.notify(closedError)
  }

  // Next frame, a close, or `onTimeout()` after `timeoutMs`
  const nextFrame = (timeoutMs: number, onTimeout: () => Error) =>
    new Promise<Frame>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer)
        offFrame()
        offClosed()
      }
      const timer = setTimeout(() => {
        cleanup()
        reject(onTimeout())
      }, timeoutMs)
      const offFrame = frame$.subscribe((frame) => {
        cleanup()
        resolve(frame)
      })
      const offClosed = closed$.subscribe((error) => {
        cleanup()
        reject(error)
      })
    })

  const close = async () => {
    const handle = child
    if (!handle || closing) {
      markClosed('Source closed')
      return
    }
    closing = true

    handle.kill('SIGTERM')
    if (!(await waitForExit(handle, 2000))) {
      logger.warn('ffmpeg ignored SIGTERM, killing')
      handle.kill('SIGKILL')
    }

    markClosed('Source closed')
    frame$.clear()
    assembler.reset()
  }

  return {
    open: async () => {
      if (child) return

      const args = ffmpegArgs(options)
      logger.info('Opening source', { url: options.url, width, height })

      const handle = spawner(command, args)
      child = handle

      handle.stdout?.on('data', (chunk: Buffer) => {
        for (const data of assembler.push(chunk)) accept(data)
      })
      handle.stderr?.on('data', (chunk: Buffer) => {
        logger.warn('ffmpeg reported an error', { stderr: chunk.toString('utf8').trim() })
      })
      handle.onExit((code, error) => {
        if (closing) {
          markClosed('Source closed')
          return
        }
        const reason = error
          ? `ffmpeg failed to start: ${error.message}`
          : `ffmpeg exited with code ${String(code)}`
        logger.error('Source closed unexpectedly', { reason })
        markClosed(reason)
      })

      try {
        await nextFrame(
          openTimeoutMs,
          () => new FrameSourceClosedError(`No frame within ${openTimeoutMs}ms of opening`),
        )
      } catch (error) {
        await close()
        throw error
      }

      logger.info('Source open')
    },

    read: async () => {
      if (closedError) throw closedError
      if (!child) throw new FrameSourceClosedError('Source not opened')

      if (latest && latest.sequence > lastRead) {
        lastRead = latest.sequence
        return latest
      }

      const frame = await nextFrame(
        readTimeoutMs,
        () => new EmptyFrameError(`No frame within ${readTimeoutMs}ms`),
      )
      lastRead = frame.sequence
      return frame
    },

    close,
    isClosed: () => closedError !== null,
  }
}
