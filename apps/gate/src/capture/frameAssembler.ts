/**
 * Reassemble fixed-size rawvideo frames from arbitrarily split stdout chunks
 */
export function createFrameAssembler(frameBytes: number) {
  let parts: Array<Buffer> = []
  let filled = 0

  return {
    /** Returns every frame completed by this chunk, oldest first */
    push: (chunk: Buffer): Array<Buffer> => {
      const frames: Array<Buffer> = []
      let offset = 0

      while (offset < chunk.length) {
        const take = Math.min(frameBytes - filled, chunk.length - offset)
        parts.push(chunk.subarray(offset, offset + take))
        filled += take
        offset += take

        if (filled === frameBytes) {
          frames.push(Buffer.concat(parts, frameBytes))
          parts = []
          filled = 0
        }
      }

      return frames
    },

    /** Bytes held towards the next frame */
    pendingBytes: () => filled,

    reset: () => {
      parts = []
      filled = 0
    },
  }
}

export type FrameAssembler = ReturnType<typeof createFrameAssembler>
