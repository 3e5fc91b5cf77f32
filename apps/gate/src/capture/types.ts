import type { Frame } from '@facegate/recognition'

/**
 * Live, unbounded, non-restartable frame sequence
 */
export type FrameSource = {
  /** Resolves once the first frame arrived. Fatal when it rejects. */
  open: () => Promise<void>
  /**
   * Next frame newer than the last one read.
   * Rejects with EmptyFrameError on a read timeout and with
   * FrameSourceClosedError once the source is gone.
   */
  read: () => Promise<Frame>
  close: () => Promise<void>
  isClosed: () => boolean
}
