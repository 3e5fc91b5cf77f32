import { describe, expect, it, vi } from 'vitest'
import { EmptyFrameError, FrameSourceClosedError } from '@facegate/recognition'
import { createFrameAssembler } from '../capture/frameAssembler'
import { createFfmpegFrameSource, ffmpegArgs } from '../capture/ffmpegFrameSource'
import { createFakeChild, flush, silentLogger } from './fixtures'

// 4x2 RGB24
const WIDTH = 4
const HEIGHT = 2
const FRAME_BYTES = WIDTH * HEIGHT * 3

const frameBytes = (fill: number) => Buffer.alloc(FRAME_BYTES, fill)

describe('createFrameAssembler', () => {
  it('should join frames split across chunks', () => {
    const assembler = createFrameAssembler(6)

    expect(assembler.push(Buffer.from([1, 2, 3, 4]))).toEqual([])
    expect(assembler.pendingBytes()).toBe(4)

    const frames = assembler.push(Buffer.from([5, 6, 7]))
    expect(frames).toEqual([Buffer.from([1, 2, 3, 4, 5, 6])])
    expect(assembler.pendingBytes()).toBe(1)
  })

  it('should return several frames from one chunk, oldest first', () => {
    const assembler = createFrameAssembler(2)
    const frames = assembler.push(Buffer.from([1, 1, 2, 2, 3]))

    expect(frames).toEqual([Buffer.from([1, 1]), Buffer.from([2, 2])])
    expect(assembler.pendingBytes()).toBe(1)
  })

  it('should drop a partial frame on reset', () => {
    const assembler = createFrameAssembler(2)
    assembler.push(Buffer.from([9]))
    assembler.reset()

    expect(assembler.push(Buffer.from([1, 2]))).toEqual([Buffer.from([1, 2])])
  })
})

describe('ffmpegArgs', () => {
  it('should add low-latency TCP flags for RTSP and crop to a square', () => {
    const args = ffmpegArgs({ url: 'rtsp://cam/feed', width: 640, height: 640, squareCrop: true })

    expect(args.slice(0, 9)).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-rtsp_transport',
      'tcp',
      '-fflags',
      'nobuffer',
      '-flags',
      'low_delay',
    ])
    expect(args[args.indexOf('-vf') + 1]).toBe("crop='min(iw,ih)':'min(iw,ih)',scale=640:640")
    expect(args.slice(-5)).toEqual(['-pix_fmt', 'rgb24', '-f', 'rawvideo', 'pipe:1'])
  })

  it('should only scale files without the square crop', () => {
    const args = ffmpegArgs({ url: 'clip.mp4', width: 320, height: 240, squareCrop: false })

    expect(args).not.toContain('-rtsp_transport')
    expect(args[args.indexOf('-i') + 1]).toBe('clip.mp4')
    expect(args[args.indexOf('-vf') + 1]).toBe('scale=320:240')
  })
})

describe('createFfmpegFrameSource', () => {
  const setup = (overrides: { openTimeoutMs?: number; readTimeoutMs?: number } = {}) => {
    const fake = createFakeChild()
    const spawner = vi.fn(() => fake.child)
    let now = 5000
    const source = createFfmpegFrameSource({
      url: 'rtsp://cam/feed',
      width: WIDTH,
      height: HEIGHT,
      logger: silentLogger,
      spawner,
      clock: { now: () => now++ },
      openTimeoutMs: overrides.openTimeoutMs ?? 1000,
      readTimeoutMs: overrides.readTimeoutMs ?? 1000,
    })
    return { ...fake, spawner, source }
  }

  it('should spawn ffmpeg and resolve open on the first frame', async () => {
    const { source, spawner, stdout } = setup()

    const opening = source.open()
    expect(spawner).toHaveBeenCalledWith('ffmpeg', expect.arrayContaining(['rtsp://cam/feed']))

    stdout.write(frameBytes(7))
    await opening

    const frame = await source.read()
    expect(frame.sequence).toBe(1)
    expect(frame.capturedAt).toBe(5000)
    expect(frame.image).toEqual({ data: frameBytes(7), width: WIDTH, height: HEIGHT, channels: 3 })
  })

  it('should hand out only the newest frame', async () => {
    const { source, stdout } = setup()
    const opening = source.open()
    stdout.write(frameBytes(1))
    await opening
    await source.read()

    stdout.write(Buffer.concat([frameBytes(2), frameBytes(3)]))
    await flush()

    const frame = await source.read()
    expect(frame.sequence).toBe(3)
    expect(frame.image.data[0]).toBe(3)
  })

  it('should wait for the next frame when the latest was already read', async () => {
    const { source, stdout } = setup()
    const opening = source.open()
    stdout.write(frameBytes(1))
    await opening
    await source.read()

    const reading = source.read()
    stdout.write(frameBytes(2))

    expect((await reading).sequence).toBe(2)
  })

  it('should throw EmptyFrameError when no frame arrives in time', async () => {
    const { source, stdout } = setup({ readTimeoutMs: 20 })
    const opening = source.open()
    stdout.write(frameBytes(1))
    await opening
    await source.read()

    await expect(source.read()).rejects.toBeInstanceOf(EmptyFrameError)
    expect(source.isClosed()).toBe(false)
  })

  it('should throw FrameSourceClosedError once ffmpeg exits', async () => {
    const { source, stdout, exit } = setup()
    const opening = source.open()
    stdout.write(frameBytes(1))
    await opening
    await source.read()

    const reading = source.read()
    exit(1)

    await expect(reading).rejects.toBeInstanceOf(FrameSourceClosedError)
    await expect(source.read()).rejects.toThrow('ffmpeg exited with code 1')
    expect(source.isClosed()).toBe(true)
  })

  it('should fail open and stop ffmpeg when no frame arrives', async () => {
    const { source, kill } = setup({ openTimeoutMs: 20 })

    await expect(source.open()).rejects.toBeInstanceOf(FrameSourceClosedError)
    expect(kill).toHaveBeenCalledWith('SIGTERM')
    expect(source.isClosed()).toBe(true)
  })

  it('should reject reads before open', async () => {
    const { source } = setup()
    await expect(source.read()).rejects.toThrow('Source not opened')
  })

  it('should terminate ffmpeg on close', async () => {
    const { source, stdout, kill } = setup()
    const opening = source.open()
    stdout.write(frameBytes(1))
    await opening

    await source.close()

    expect(kill).toHaveBeenCalledWith('SIGTERM')
    expect(source.isClosed()).toBe(true)
    await expect(source.read()).rejects.toThrow('Source closed')
  })
})
