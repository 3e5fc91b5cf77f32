/**
 * Mutex
 *
 * Promise-chained mutual exclusion for async critical sections. Callers
 * queue in arrival order; a section that throws releases the lock and
 * rejects only its own caller.
 */

export type Mutex = {
  runExclusive: <T>(section: () => Promise<T> | T) => Promise<T>
  isLocked: () => boolean
}

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve()
  let holders = 0

  return {
    runExclusive: <T>(section: () => Promise<T> | T) => {
      holders += 1
      const result = tail.then(section)
      // The chain continues whether the section resolved or rejected
      tail = result.then(
        () => {
          holders -= 1
        },
        () => {
          holders -= 1
        },
      )
      return result
    },

    isLocked: () => holders > 0,
  }
}
