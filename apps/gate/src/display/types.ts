import type { RawImage } from '@facegate/recognition'

/**
 * Where finished frames go. present() never waits on the viewer.
 */
export type DisplaySink = {
  /** Returns false when the frame was dropped (viewer busy or gone) */
  present: (image: RawImage) => boolean
  close: () => Promise<void>
  isClosed: () => boolean
}
