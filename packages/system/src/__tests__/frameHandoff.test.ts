import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createFrameHandoff } from '@facegate/system'

describe('createFrameHandoff', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should return a waiting item immediately', async () => {
    const handoff = createFrameHandoff<string>()

    expect(handoff.offer('a')).toBe(false)
    expect(handoff.hasPending()).toBe(true)

    await expect(handoff.take(100)).resolves.toBe('a')
    expect(handoff.hasPending()).toBe(false)
  })

  it('should keep only the newest item and count evictions', async () => {
    const handoff = createFrameHandoff<number>()

    expect(handoff.offer(1)).toBe(false)
    expect(handoff.offer(2)).toBe(true)
    expect(handoff.offer(3)).toBe(true)

    await expect(handoff.take(100)).resolves.toBe(3)
    expect(handoff.getDroppedCount()).toBe(2)
  })

  it('should hand an item out at most once', async () => {
    const handoff = createFrameHandoff<string>()
    handoff.offer('a')

    await expect(handoff.take(0)).resolves.toBe('a')

    const second = handoff.take(50)
    await vi.advanceTimersByTimeAsync(50)
    await expect(second).resolves.toBeNull()
  })

  it('should resolve null when the timeout elapses', async () => {
    const handoff = createFrameHandoff<string>()
    let result: string | null | undefined

    const taking = handoff.take(100).then((value) => {
      result = value
    })

    await vi.advanceTimersByTimeAsync(99)
    expect(result).toBeUndefined()

    await vi.advanceTimersByTimeAsync(1)
    await taking
    expect(result).toBeNull()
  })

  it('should wake a parked consumer on offer', async () => {
    const handoff = createFrameHandoff<string>()

    const taking = handoff.take(1000)
    expect(handoff.offer('late')).toBe(false)

    await expect(taking).resolves.toBe('late')
    expect(handoff.hasPending()).toBe(false)
    expect(handoff.getDroppedCount()).toBe(0)
  })

  it('should reject a second concurrent take', async () => {
    const handoff = createFrameHandoff<string>()

    const first = handoff.take(100)

    await expect(handoff.take(100)).rejects.toThrow(
      '[FrameHandoff] take() called while another take() is pending',
    )

    handoff.offer('a')
    await expect(first).resolves.toBe('a')
  })

  it('should release a parked consumer and refuse offers once closed', async () => {
    const handoff = createFrameHandoff<string>()

    const taking = handoff.take(1000)
    handoff.close()

    await expect(taking).resolves.toBeNull()
    expect(handoff.isClosed()).toBe(true)
    expect(handoff.offer('ignored')).toBe(false)
    await expect(handoff.take(1000)).resolves.toBeNull()
  })

  it('should discard a pending item on close', async () => {
    const handoff = createFrameHandoff<string>()
    handoff.offer('stale')
    handoff.close()

    expect(handoff.hasPending()).toBe(false)
    await expect(handoff.take(10)).resolves.toBeNull()
  })
})
