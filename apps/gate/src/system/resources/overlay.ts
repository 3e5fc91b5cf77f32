import { defineResource } from 'braided'
import { watchOverlayTasks } from '../../overlay'
import type { GateLoop } from '../../gate/gateLoop'

/**
 * Watch-mode overlay: timestamp, error banner, face boxes, status
 */
export const watchOverlayResource = defineResource({
  dependencies: ['loop'],
  start: ({ loop }: { loop: GateLoop }) => {
    const removals = watchOverlayTasks().map((task) => loop.addOverlayTask(task))

    return {
      cleanup: () => {
        removals.forEach((remove) => remove())
      },
    }
  },
  halt: ({ cleanup }) => {
    cleanup()
  },
})
