/**
 * Keymap Evaluation
 *
 * Keymaps are written `key`, `ctrl+key` or `ctrl+shift+key` and matched
 * against readline keypress events. Space is spelled `space`.
 */

export const shortcutModifiers = {
  shift: 'shift',
  ctrl: 'ctrl',
  meta: 'meta',
} as const

type Modifier = keyof typeof shortcutModifiers

export type Keymap =
  | `${Modifier}+${string}`
  | `${Modifier}+${Modifier}+${string}`
  | string

/**
 * The parts of a readline keypress we match on
 */
export type KeyPress = {
  name?: string
  sequence?: string
  ctrl?: boolean
  meta?: boolean
  shift?: boolean
}

export type Shortcut = {
  keymaps: Array<Keymap>
  handler: () => void
}

export type EvaluatedKeymap = {
  key: string
  shift: boolean
  ctrl: boolean
  meta: boolean
}

const isModifier = (token: string): token is Modifier => token in shortcutModifiers

const spaceOrKey = (key: string) => (key === ' ' ? 'space' : key)

export const evaluateKeymap = (keymap: Keymap): EvaluatedKeymap | null => {
  const tokens = keymap.split('+')
  const modifiers = tokens.filter(isModifier)
  const keys = tokens.filter((token) => !isModifier(token))

  const [key] = keys
  if (keys.length !== 1 || key === undefined || key === '') return null

  return {
    key: spaceOrKey(key).toLowerCase(),
    shift: modifiers.includes('shift'),
    ctrl: modifiers.includes('ctrl'),
    meta: modifiers.includes('meta'),
  }
}

const pressedKey = (press: KeyPress) =>
  spaceOrKey(press.name ?? press.sequence ?? '').toLowerCase()

export const matchesKeymap = (keymap: EvaluatedKeymap, press: KeyPress) =>
  keymap.key === pressedKey(press) &&
  keymap.shift === Boolean(press.shift) &&
  keymap.ctrl === Boolean(press.ctrl) &&
  keymap.meta === Boolean(press.meta)

/**
 * First shortcut with a keymap matching `press`
 */
export const findShortcut = (shortcuts: ReadonlyArray<Shortcut>, press: KeyPress) =>
  shortcuts.find(({ keymaps }) =>
    keymaps.some((keymap) => {
      const evaluated = evaluateKeymap(keymap)
      return evaluated !== null && matchesKeymap(evaluated, press)
    }),
  )
