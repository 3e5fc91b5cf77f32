import { PassThrough } from 'node:stream'
import { vi } from 'vitest'
import { createLogger } from '@facegate/system'
import type { Frame, RawImage, Recognition, ResultSet } from '@facegate/recognition'
import type { ChildHandle } from '../capture/childProcess'

export const silentLogger = createLogger({ silent: true })

export const makeImage = (width = 4, height = 4, fill = 0): RawImage => ({
  data: Buffer.alloc(width * height * 3, fill),
  width,
  height,
  channels: 3,
})

export const makeFrame = (sequence = 1, image: RawImage = makeImage()): Frame => ({
  sequence,
  image,
  capturedAt: 1000 + sequence,
})

export const face = (identity: string, confidence: number): Recognition => ({
  box: { xMin: 100, yMin: 50, xMax: 300, yMax: 250 },
  result: { identity, confidence },
})

export const makeResultSet = (
  sequence: number,
  recognitions: Array<Recognition> = [],
  error: ResultSet['error'] = null,
): ResultSet => ({
  sequence,
  frame: makeFrame(sequence),
  imageSize: { width: 640, height: 640 },
  recognitions,
  error,
  completedAt: 2000 + sequence,
})

export const flush = () => new Promise<void>((resolve) => setImmediate(resolve))

/**
 * In-process stand-in for a spawned ffmpeg/ffplay
 */
export const createFakeChild = () => {
  const stdin = new PassThrough()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const listeners: Array<(code: number | null, error?: Error) => void> = []
  let exited = false

  const exit = (code: number | null, error?: Error) => {
    if (exited) return
    exited = true
    listeners.forEach((listener) => listener(code, error))
  }

  const kill = vi.fn<ChildHandle['kill']>(() => {
    exit(null)
    return true
  })

  const child: ChildHandle = {
    stdin,
    stdout,
    stderr,
    kill,
    onExit: (listener) => {
      if (exited) {
        listener(0)
        return
      }
      listeners.push(listener)
    },
  }

  return { child, stdin, stdout, stderr, kill, exit }
}
