/**
 * Shortcuts Resource
 *
 * Single-key commands read from stdin in raw mode. Only active when
 * stdin is a TTY.
 *
 *   q, ctrl+c  quit
 *   space      pause / resume
 *   o          toggle overlay
 */

import readline from 'node:readline'
import { throttle } from '@tanstack/pacer'
import { defineResource } from 'braided'
import { componentLogger } from '@facegate/system'
import type { Logger } from '@facegate/system'
import type { GateLoop } from '../../gate/gateLoop'
import { findShortcut } from '../../gate/keymap'
import type { KeyPress, Shortcut } from '../../gate/keymap'
import { shutdownReasons } from '../../gate/shutdown'
import type { ShutdownResource } from './shutdown'

type ShortcutsDependencies = {
  logger: Logger
  loop: GateLoop
  shutdown: ShutdownResource
}

export const shortcutsResource = defineResource({
  dependencies: ['logger', 'loop', 'shutdown'],
  start: ({ logger, loop, shutdown }: ShortcutsDependencies) => {
    const log = componentLogger(logger, 'Shortcuts')
    const stdin = process.stdin

    if (!stdin.isTTY) {
      log.info('stdin is not a TTY, shortcuts disabled')
      return { cleanup: () => {} }
    }

    // ========================================================================
    // Commands
    // ========================================================================

    const commands = {
      quit: () => {
        shutdown.request(shutdownReasons.quit)
      },
      togglePause: () => {
        loop.togglePause()
      },
      toggleOverlay: () => {
        log.info('Toggling overlay')
        loop.toggleOverlay()
      },
    }

    const throttledCommands = {
      togglePause: throttle(commands.togglePause, { wait: 100 }),
      toggleOverlay: throttle(commands.toggleOverlay, { wait: 100 }),
    }

    const shortcuts: Array<Shortcut> = [
      { keymaps: ['q', 'ctrl+c'], handler: () => commands.quit() },
      { keymaps: ['space'], handler: () => throttledCommands.togglePause() },
      { keymaps: ['o'], handler: () => throttledCommands.toggleOverlay() },
    ]

    // ========================================================================
    // Keypress Handler
    // ========================================================================

    const handleKeyPress = (_input: string | undefined, press: KeyPress | undefined) => {
      if (!press) return
      findShortcut(shortcuts, press)?.handler()
    }

    readline.emitKeypressEvents(stdin)
    stdin.setRawMode(true)
    stdin.on('keypress', handleKeyPress)
    stdin.resume()
    log.info('Keys: q quit, space pause, o overlay')

    return {
      cleanup: () => {
        stdin.off('keypress', handleKeyPress)
        stdin.setRawMode(false)
        stdin.pause()
      },
    }
  },
  halt: ({ cleanup }) => {
    cleanup()
  },
})
