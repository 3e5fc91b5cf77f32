/**
 * Task Pipeline
 *
 * Ordered list of per-frame tasks sharing one context. Used for overlay
 * drawing: each task contributes its layer and a failing task is reported
 * without stopping the ones after it.
 *
 * Philosophy:
 * - Simple rules compose
 * - Tasks are isolated and composable
 * - Context is just data flowing through
 */

/**
 * Task with a name (for error reports) and optional cleanup
 */
export type NamedTask<TContext> = {
  name: string
  execute: (context: TContext) => void
  cleanup?: () => void
}

/**
 * Simple task function
 */
export type TaskFn<TContext> = (context: TContext) => void

export type TaskDefinition<TContext> = NamedTask<TContext> | TaskFn<TContext>

export type TaskPipeline<TContext> = {
  /**
   * Append a task. Returns a function that removes it (and runs its cleanup).
   */
  addTask: (task: TaskDefinition<TContext>) => () => void

  /**
   * Run every task in insertion order
   */
  execute: (context: TContext) => void

  /**
   * Remove all tasks, running each cleanup
   */
  clear: () => void

  size: () => number
}

export type TaskPipelineOptions<TContext> = {
  /**
   * Receives errors thrown by execute or cleanup.
   * Without it the error is rethrown and the remaining tasks are skipped.
   */
  onError?: (error: Error, taskName: string, task: TaskDefinition<TContext>) => void
}

const taskName = <TContext>(task: TaskDefinition<TContext>) =>
  typeof task === 'function' ? task.name || 'anonymous' : task.name

/**
 * Create a task pipeline
 */
export const createTaskPipeline = <TContext>(
  options: TaskPipelineOptions<TContext> = {},
): TaskPipeline<TContext> => {
  const tasks: Array<TaskDefinition<TContext>> = []
  const { onError } = options

  const report = (error: unknown, task: TaskDefinition<TContext>) => {
    const normalized = error instanceof Error ? error : new Error(String(error))
    if (!onError) throw normalized
    onError(normalized, taskName(task), task)
  }

  const runCleanup = (task: TaskDefinition<TContext>) => {
    if (typeof task === 'function') return
    try {
      task.cleanup?.()
    } catch (error) {
      report(error, task)
    }
  }

  const api = {
    addTask: (task) => {
      tasks.push(task)
      return () => {
        const index = tasks.indexOf(task)
        if (index === -1) return
        tasks.splice(index, 1)
        runCleanup(task)
      }
    },

    execute: (context) => {
      // Copy so a task removing itself does not skip its neighbour
      for (const task of tasks.slice()) {
        try {
          if (typeof task === 'function') {
            task(context)
          } else {
            task.execute(context)
          }
        } catch (error) {
          report(error, task)
        }
      }
    },

    clear: () => {
      const removed = tasks.splice(0, tasks.length)
      removed.forEach(runCleanup)
    },

    size: () => tasks.length,
  } satisfies TaskPipeline<TContext>

  return api
}
