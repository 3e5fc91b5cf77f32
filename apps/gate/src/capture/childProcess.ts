/**
 * Child Process Handle
 *
 * The slice of a spawned ffmpeg/ffplay process the adapters use. Tests
 * substitute an in-process fake built from PassThrough streams.
 */

import { spawn } from 'node:child_process'
import type { Readable, Writable } from 'node:stream'

export type ChildHandle = {
  stdin: Writable | null
  stdout: Readable | null
  stderr: Readable | null
  kill: (signal?: NodeJS.Signals) => boolean
  /** Called once, on exit or on a spawn failure */
  onExit: (listener: (code: number | null, error?: Error) => void) => void
}

export type Spawner = (command: string, args: ReadonlyArray<string>) => ChildHandle

export const spawnChild: Spawner = (command, args) => {
  const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] })
  const listeners: Array<(code: number | null, error?: Error) => void> = []
  let exited: { code: number | null; error?: Error } | null = null

  const settle = (code: number | null, error?: Error) => {
    if (exited) return
    exited = { code, error }
    for (const listener of listeners) listener(code, error)
  }

  child.once('exit', (code) => settle(code))
  child.once('error', (error) => settle(null, error))

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    kill: (signal) => child.kill(signal),
    onExit: (listener) => {
      if (exited) {
        listener(exited.code, exited.error)
        return
      }
      listeners.push(listener)
    },
  }
}

/**
 * Resolves true once the child exits, or false after `timeoutMs`
 */
export const waitForExit = (child: ChildHandle, timeoutMs: number) =>
  new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs)
    child.onExit(() => {
      clearTimeout(timer)
      resolve(true)
    })
  })
