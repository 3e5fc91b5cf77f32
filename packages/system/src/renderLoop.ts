/**
 * Generic Render Loop
 *
 * Cooperative frame loop for Node processes. One tick runs at a time:
 * the next tick is only scheduled once both hooks of the current one
 * have settled, so a slow capture or composite stretches the frame
 * instead of overlapping it.
 *
 * Philosophy:
 * - Generic context type, created once on first start
 * - Lifecycle hooks (beforeRender, afterRender), sync or async
 * - Optional FPS throttling
 * - Pluggable scheduler (timers in production, manual in tests)
 * - Errors are reported, never fatal to the loop
 */

import { performance } from 'node:perf_hooks'

/**
 * Schedules a frame callback after `delayMs` and returns a cancel function.
 */
export type FrameScheduler = {
  requestFrame: (
    callback: (timestamp: number) => void,
    delayMs: number,
  ) => () => void
}

export type RenderHook<TContext> = (
  context: TContext,
  timestamp: number,
  deltaMs: number,
) => void | Promise<void>

export type RenderLoopOptions<TContext> = {
  /**
   * Factory for the render context, called once on first start
   */
  createContext: () => TContext

  /**
   * Called before each frame: capture, hand-off, state updates
   */
  beforeRender?: RenderHook<TContext>

  /**
   * Called after beforeRender settles: drawing and presenting
   */
  afterRender?: RenderHook<TContext>

  /**
   * Called when a hook throws or rejects.
   * Defaults to console.error.
   */
  onError?: (error: Error) => void

  /**
   * Optional target FPS. Without it the next tick is scheduled immediately.
   */
  targetFPS?: number

  scheduler?: FrameScheduler
}

export type RenderLoopAPI<TContext = unknown> = {
  /** Start the loop. Idempotent. */
  start: () => void

  /** Stop the loop and wait for an in-flight tick to settle */
  stop: () => Promise<void>

  /** Stop scheduling ticks but keep the context */
  pause: () => void

  resume: () => void

  isRunning: () => boolean

  isPaused: () => boolean

  /** Null until the loop has started once */
  getContext: () => TContext | null
}

export const timerScheduler: FrameScheduler = {
  requestFrame: (callback, delayMs) => {
    const handle = setTimeout(() => callback(performance.now()), delayMs)
    return () => clearTimeout(handle)
  },
}

const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(String(error))

/**
 * Create a generic render loop
 *
 * @example
 * ```typescript
 * const loop = createRenderLoop({
 *   createContext: () => ({ source, handoff, cache }),
 *   beforeRender: async (context) => {
 *     const frame = await context.source.read()
 *     context.handoff.offer(frame)
 *   },
 *   afterRender: (context) => {
 *     draw(context.cache.read())
 *   },
 * })
 *
 * loop.start()
 * ```
 */
export function createRenderLoop<TContext>(
  options: RenderLoopOptions<TContext>,
): RenderLoopAPI<TContext> {
  const {
    createContext,
    beforeRender,
    afterRender,
    onError,
    targetFPS,
    scheduler = timerScheduler,
  } = options

  let running = false
  let paused = false
  let cancelFrame: (() => void) | null = null
  let inFlight: Promise<void> | null = null
  let context: TContext | null = null
  let lastTimestamp = 0

  const frameInterval = targetFPS ? 1000 / targetFPS : 0

  const reportError = (error: unknown) => {
    if (onError) {
      onError(toError(error))
    } else {
      console.error('[RenderLoop] Error in render loop:', error)
    }
  }

  const schedule = (delayMs: number) => {
    cancelFrame = scheduler.requestFrame(onFrame, delayMs)
  }

  const runHooks = async (
    current: TContext,
    timestamp: number,
    deltaMs: number,
  ) => {
    try {
      await beforeRender?.(current, timestamp, deltaMs)
      await afterRender?.(current, timestamp, deltaMs)
    } catch (error) {
      reportError(error)
    }
  }

  const tick = async (timestamp: number) => {
    const deltaMs = lastTimestamp === 0 ? 0 : timestamp - lastTimestamp

    if (frameInterval > 0 && lastTimestamp !== 0 && deltaMs < frameInterval) {
      schedule(frameInterval - deltaMs)
      return
    }

    lastTimestamp = timestamp

    if (context) {
      await runHooks(context, timestamp, deltaMs)
    }

    // stop() or pause() may have landed while the hooks were pending
    if (running && !paused) {
      schedule(0)
    }
  }

  function onFrame(timestamp: number) {
    cancelFrame = null
    if (!running || paused) return
    inFlight = tick(timestamp).finally(() => {
      inFlight = null
    })
  }

  const cancelScheduled = () => {
    if (cancelFrame) {
      cancelFrame()
      cancelFrame = null
    }
  }

  const start = () => {
    if (running) return

    if (!context) {
      context = createContext()
    }

    running = true
    paused = false
    lastTimestamp = 0

    schedule(0)
  }

  const stop = async () => {
    running = false
    paused = false
    cancelScheduled()
    lastTimestamp = 0

    if (inFlight) {
      await inFlight
    }
  }

  const pause = () => {
    if (!running || paused) return
    paused = true
    cancelScheduled()
  }

  const resume = () => {
    if (!running || !paused) return
    paused = false
    lastTimestamp = 0
    // A tick still settling will schedule the next one itself
    if (!inFlight) {
      schedule(0)
    }
  }

  return {
    start,
    stop,
    pause,
    resume,
    isRunning: () => running,
    isPaused: () => paused,
    getContext: () => context,
  }
}
