import { describe, expect, it, vi } from 'vitest'
import { createTaskPipeline } from '@facegate/system'

describe('createTaskPipeline', () => {
  describe('simple function tasks', () => {
    it('should execute simple function tasks', () => {
      const pipeline = createTaskPipeline<{ value: number }>()

      const results: Array<number> = []
      const task = (ctx: { value: number }) => {
        results.push(ctx.value)
      }

      pipeline.addTask(task)
      pipeline.execute({ value: 42 })

      expect(results).toEqual([42])
    })

    it('should execute multiple tasks in order', () => {
      const pipeline = createTaskPipeline<{ value: number }>()

      const results: Array<number> = []
      pipeline.addTask((ctx) => results.push(ctx.value * 1))
      pipeline.addTask((ctx) => results.push(ctx.value * 2))
      pipeline.addTask((ctx) => results.push(ctx.value * 3))

      pipeline.execute({ value: 10 })

      expect(results).toEqual([10, 20, 30])
    })

    it('should remove task when unsubscribe is called', () => {
      const pipeline = createTaskPipeline<{ value: number }>()

      const results: Array<number> = []
      const unsubscribe = pipeline.addTask((ctx) => results.push(ctx.value))

      pipeline.execute({ value: 1 })
      expect(results).toEqual([1])

      unsubscribe()
      pipeline.execute({ value: 2 })
      expect(results).toEqual([1]) // Task not executed after unsubscribe
    })
  })

  describe('named tasks', () => {
    it('should run cleanup when the task is removed', () => {
      const pipeline = createTaskPipeline<{ value: number }>()
      const cleanup = vi.fn()

      const remove = pipeline.addTask({ name: 'layer', execute: () => {}, cleanup })
      expect(pipeline.size()).toBe(1)

      remove()
      remove()

      expect(cleanup).toHaveBeenCalledTimes(1)
      expect(pipeline.size()).toBe(0)
    })

    it('should run every cleanup on clear', () => {
      const pipeline = createTaskPipeline<{ value: number }>()
      const first = vi.fn()
      const second = vi.fn()

      pipeline.addTask({ name: 'first', execute: () => {}, cleanup: first })
      pipeline.addTask({ name: 'second', execute: () => {}, cleanup: second })
      pipeline.addTask(() => {})

      pipeline.clear()

      expect(first).toHaveBeenCalledTimes(1)
      expect(second).toHaveBeenCalledTimes(1)
      expect(pipeline.size()).toBe(0)
    })

    it('should not skip the next task when a task removes itself', () => {
      const pipeline = createTaskPipeline<{ value: number }>()
      const results: Array<string> = []

      const removeSelf = pipeline.addTask({
        name: 'once',
        execute: () => {
          results.push('once')
          removeSelf()
        },
      })
      pipeline.addTask({ name: 'always', execute: () => results.push('always') })

      pipeline.execute({ value: 0 })
      pipeline.execute({ value: 0 })

      expect(results).toEqual(['once', 'always', 'always'])
    })
  })

  describe('error handling', () => {
    it('should report errors and continue with the remaining tasks', () => {
      const onError = vi.fn()
      const pipeline = createTaskPipeline<{ value: number }>({ onError })
      const after = vi.fn()

      const failing = {
        name: 'failing',
        execute: () => {
          throw new Error('boom')
        },
      }
      pipeline.addTask(failing)
      pipeline.addTask(after)

      pipeline.execute({ value: 1 })

      expect(onError).toHaveBeenCalledTimes(1)
      expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(Error)
      expect(onError.mock.calls[0]?.[1]).toBe('failing')
      expect(onError.mock.calls[0]?.[2]).toBe(failing)
      expect(after).toHaveBeenCalledWith({ value: 1 })
    })

    it('should wrap non-Error throws', () => {
      const onError = vi.fn()
      const pipeline = createTaskPipeline<{ value: number }>({ onError })

      pipeline.addTask({
        name: 'stringly',
        execute: () => {
          throw 'nope'
        },
      })
      pipeline.execute({ value: 1 })

      const [error] = onError.mock.calls[0] ?? []
      expect(error).toBeInstanceOf(Error)
      expect(error).toHaveProperty('message', 'nope')
    })

    it('should rethrow without an onError handler', () => {
      const pipeline = createTaskPipeline<{ value: number }>()
      const after = vi.fn()

      pipeline.addTask(() => {
        throw new Error('boom')
      })
      pipeline.addTask(after)

      expect(() => pipeline.execute({ value: 1 })).toThrow('boom')
      expect(after).not.toHaveBeenCalled()
    })
  })
})
