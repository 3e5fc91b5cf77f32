/**
 * Gate Loop
 *
 * The capture/present side of the pipeline, on top of the generic render
 * loop:
 *
 *   beforeRender: read newest frame -> offer every Nth frame to the handoff
 *   afterRender:  overlay tasks over the latest cached set -> present
 *
 * It never waits on inference: the overlay always uses whatever set the
 * cache holds, even one computed from an older frame.
 */

import { createAtom, createRenderLoop, createTaskPipeline, errorMeta } from '@facegate/system'
import type { FrameHandoff, FrameScheduler, Logger } from '@facegate/system'
import { isRecognitionError, recognitionKeywords } from '@facegate/recognition'
import type { Frame, RawImage, ResultCache } from '@facegate/recognition'
import type { FrameSource } from '../capture/types'
import type { DisplaySink } from '../display/types'
import { createOverlayCanvas } from '../overlay/overlayCanvas'
import type { OverlayContext, OverlayTask } from '../overlay/types'

const { errorKinds } = recognitionKeywords

export type GateLoopState = {
  running: boolean
  paused: boolean
  overlayVisible: boolean
  /** Frames read from the source */
  frames: number
  /** Frames offered to the handoff */
  offered: number
  fps: number
}

export type GateLoopOptions = {
  source: FrameSource
  handoff: FrameHandoff<Frame>
  cache: ResultCache
  display: DisplaySink
  composite: (image: RawImage, svg: string) => Promise<RawImage>
  logger: Logger
  /** Offer one frame out of every `offerEvery` */
  offerEvery?: number
  targetFPS?: number
  /** The source is gone; the loop has stopped reading */
  onFatal?: (error: Error) => void
  scheduler?: FrameScheduler
  now?: () => Date
}

type GateLoopContext = {
  frame: Frame | null
}

// Exponential moving average keeps the readout steady
const smoothFps = (previous: number, deltaMs: number) => {
  if (deltaMs <= 0) return previous
  const instant = 1000 / deltaMs
  return previous === 0 ? instant : previous * 0.9 + instant * 0.1
}

export function createGateLoop(options: GateLoopOptions) {
  const {
    source,
    handoff,
    cache,
    display,
    composite,
    logger,
    offerEvery = 1,
    targetFPS = 30,
    onFatal,
    scheduler,
    now = () => new Date(),
  } = options

  const state = createAtom<GateLoopState>({
    running: false,
    paused: false,
    overlayVisible: true,
    frames: 0,
    offered: 0,
    fps: 0,
  })

  const pipeline = createTaskPipeline<OverlayContext>({
    onError: (error, taskName) => {
      logger.error('Overlay task failed', { task: taskName, ...errorMeta(error) })
    },
  })

  let fatal = false

  const capture = async (context: GateLoopContext) => {
    // Paused: keep presenting the frozen frame
    if (state.get().paused && context.frame) return

    try {
      const frame = await source.read()
      context.frame = frame

      const frames = state.get().frames + 1
      const offer = frames % offerEvery === 0
      if (offer) handoff.offer(frame)
      state.update((current) => ({
        ...current,
        frames,
        offered: current.offered + (offer ? 1 : 0),
      }))
    } catch (error) {
      if (isRecognitionError(error, errorKinds.emptyFrame)) {
        logger.debug('No frame this tick')
        return
      }
      if (isRecognitionError(error, errorKinds.frameSourceClosed)) {
        if (fatal) return
        fatal = true
        logger.error('Frame source closed', errorMeta(error))
        loop.pause()
        onFatal?.(error)
        return
      }
      throw error
    }
  }

  const present = async (context: GateLoopContext, deltaMs: number) => {
    const { frame } = context
    if (!frame) return

    const current = state.get()
    const fps = smoothFps(current.fps, deltaMs)
    state.set({ ...current, fps })

    let image = frame.image
    if (current.overlayVisible && pipeline.size() > 0) {
      const canvas = createOverlayCanvas(image.width, image.height)
      pipeline.execute({
        canvas,
        frame,
        result: cache.read(),
        now: now(),
        paused: current.paused,
        fps,
      })

      if (!canvas.isEmpty()) {
        try {
          image = await composite(image, canvas.toSvg())
        } catch (error) {
          // The bare frame still goes out
          logger.warn('Overlay composite failed', errorMeta(error))
        }
      }
    }

    display.present(image)
  }

  const loop = createRenderLoop<GateLoopContext>({
    createContext: () => ({ frame: null }),
    beforeRender: (context) => capture(context),
    afterRender: (context, _timestamp, deltaMs) => present(context, deltaMs),
    onError: (error) => {
      logger.error('Gate loop tick failed', errorMeta(error))
    },
    targetFPS,
    scheduler,
  })

  const setPaused = (paused: boolean) => {
    state.update((current) => ({ ...current, paused }))
    logger.info(paused ? 'Paused' : 'Resumed')
  }

  return {
    state,
    pipeline,

    start: () => {
      loop.start()
      state.update((current) => ({ ...current, running: true }))
    },

    stop: async () => {
      await loop.stop()
      state.update((current) => ({ ...current, running: false }))
    },

    togglePause: () => setPaused(!state.get().paused),

    toggleOverlay: () => {
      state.update((current) => ({ ...current, overlayVisible: !current.overlayVisible }))
    },

    /** Add an overlay task. Returns its removal. */
    addOverlayTask: (task: OverlayTask) => pipeline.addTask(task),
  }
}

export type GateLoop = ReturnType<typeof createGateLoop>
