/**
 * State Primitives
 *
 * Subscriptions and atoms shared by every long-lived resource.
 * No framework bindings: consumers subscribe with plain callbacks.
 */

/**
 * Create a subscription object with a payload
 * @returns A subscription object
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<(payload: TPayload) => void>()

  return {
    subscribe: (callback: (payload: TPayload) => void): (() => void) => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    notify: (payload: TPayload) => {
      // Snapshot so a callback may unsubscribe itself mid-notify
      for (const callback of Array.from(subscribers)) {
        callback(payload)
      }
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => subscribers.size,
  }
}

export type Subscription<TPayload> = ReturnType<
  typeof createSubscription<TPayload>
>

/**
 * Create a lightweight state atom with subscriptions.
 *
 * `set` and `update` replace the held reference in one assignment, so a
 * reader calling `get()` sees either the previous value or the next one.
 */
export function createAtom<T>(initialState: T) {
  let state = initialState
  const stateSubscription = createSubscription<T>()

  return {
    get: () => state,
    set: (newState: T) => {
      state = newState
      stateSubscription.notify(state)
    },
    update: (updater: (state: T) => T) => {
      state = updater(state)
      stateSubscription.notify(state)
    },
    subscribe: (callback: (state: T) => void): (() => void) =>
      stateSubscription.subscribe(callback),
    clear: () => {
      stateSubscription.clear()
    },
  }
}

export type Atom<T> = ReturnType<typeof createAtom<T>>
