/**
 * Task Group
 *
 * Bounded set of detached async tasks. Callers spawn side effects without
 * awaiting them; shutdown calls drain() to wait for whatever is still in
 * flight instead of abandoning it.
 *
 * A task that rejects is reported through onError and removed. The group
 * itself never rejects.
 */

export type TaskGroupOptions = {
  /** Used in error reports */
  name: string

  /**
   * Maximum number of tasks in flight. spawn() refuses beyond it.
   * Defaults to unbounded.
   */
  limit?: number

  onError?: (error: Error, label: string) => void
}

export type TaskGroup = {
  /**
   * Start `task` detached. Returns false (and does not start it) when the
   * group is full or closed.
   */
  spawn: (label: string, task: () => Promise<unknown>) => boolean

  inFlight: () => number
  isFull: () => boolean

  /** Resolve once every task spawned so far (and any they spawn) settled */
  drain: () => Promise<void>

  /** Refuse new tasks, then drain */
  close: () => Promise<void>
}

export function createTaskGroup(options: TaskGroupOptions): TaskGroup {
  const { name, limit = Number.POSITIVE_INFINITY } = options
  const running = new Set<Promise<void>>()
  let closed = false

  const report =
    options.onError ??
    ((error: Error, label: string) => {
      console.error(`[TaskGroup:${name}] ${label} failed:`, error)
    })

  const isFull = () => running.size >= limit

  const drain = async () => {
    while (running.size > 0) {
      await Promise.all(Array.from(running))
    }
  }

  return {
    spawn: (label, task) => {
      if (closed || isFull()) return false

      const tracked: Promise<void> = Promise.resolve()
        .then(task)
        .then(
          () => undefined,
          (error: unknown) => {
            report(error instanceof Error ? error : new Error(String(error)), label)
          },
        )
        .finally(() => {
          running.delete(tracked)
        })

      running.add(tracked)
      return true
    },

    inFlight: () => running.size,
    isFull,
    drain,

    close: async () => {
      closed = true
      await drain()
    },
  }
}
