// =============================================================================
// USER INPUT
// =============================================================================

import type { RadixState } from './radix-state'
import type { ActionEnvelope, BufferAction, EditorAction } from './reducers'

export interface KeyModifiers {
  readonly ctrl?: boolean
  readonly meta?: boolean
  readonly alt?: boolean
  readonly shift?: boolean
}

/**
 * Raw input as the windowing layer reports it. `key` follows the DOM
 * `KeyboardEvent.key` names, except left shift which is reported by its code,
 * `ShiftLeft`.
 */
export type UserInput =
  | {
      readonly type: 'key'
      readonly key: string
      readonly action: 'press' | 'repeat' | 'release'
      readonly modifiers?: KeyModifiers
    }
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'scroll'; readonly delta: { readonly x: number; readonly y: number } }

type KeyInput = Extract<UserInput, { type: 'key' }>

const toBuffer = (action: BufferAction): ActionEnvelope => ({ target: 'buffer', action })
const toEditor = (action: EditorAction): ActionEnvelope => ({ target: 'editor', action })

const delta = (lines: number, columns: number) =>
  toBuffer({ type: 'move_cursor', motion: { kind: 'delta', lines, columns } })

const ARROWS: Readonly<Record<string, ActionEnvelope>> = {
  ArrowLeft: delta(0, -1),
  ArrowRight: delta(0, 1),
  ArrowUp: delta(-1, 0),
  ArrowDown: delta(1, 0)
}

const CONTROL_CHAR = /\p{Cc}/u

function isPrintable(key: string): boolean {
  return Array.from(key).length === 1 && !CONTROL_CHAR.test(key)
}

function mapCommand(state: RadixState, key: string): ActionEnvelope | undefined {
  switch (key.toLowerCase()) {
    case 'home':
      return toBuffer({ type: 'move_cursor', motion: { kind: 'first_line' } })
    case 'end':
      return toBuffer({ type: 'move_cursor', motion: { kind: 'last_line' } })
    case 'n':
      return toBuffer({ type: 'open_buffer' })
    case 'w':
      return state.activeBuf === undefined ? undefined : toBuffer({ type: 'close_buffer', id: state.activeBuf })
    default:
      return undefined
  }
}

function mapKey(state: RadixState, input: KeyInput): ActionEnvelope | undefined {
  const { key, modifiers = {} } = input

  if (input.action === 'release') {
    return key === 'ShiftLeft' && state.lateral ? toEditor({ type: 'set_minor_mode', mode: 'none' }) : undefined
  }

  if (key === 'ShiftLeft') {
    return state.lateral ? undefined : toEditor({ type: 'set_minor_mode', mode: 'lateral' })
  }

  if (modifiers.ctrl || modifiers.meta) return mapCommand(state, key)

  switch (key) {
    case 'Enter':
      return toBuffer({ type: 'insert', text: '\n' })
    case 'Tab':
      return toBuffer({ type: 'insert', text: '  ' })
    case 'Backspace':
      return toBuffer({ type: 'backspace' })
  }

  const arrow = ARROWS[key]
  if (arrow) return arrow

  return isPrintable(key) ? toBuffer({ type: 'insert', text: key }) : undefined
}

/**
 * Translates raw input into the action it stands for, given the current
 * snapshot. Input with no meaning in the current state maps to `undefined`.
 *
 * @example
 * ```ts
 * mapUserInput(state, { type: 'key', key: 'a', action: 'press' })
 * // => { target: 'buffer', action: { type: 'insert', text: 'a' } }
 * ```
 */
export function mapUserInput(state: RadixState, input: UserInput): ActionEnvelope | undefined {
  switch (input.type) {
    case 'key':
      return mapKey(state, input)
    case 'text':
      return input.text === '' ? undefined : toBuffer({ type: 'insert', text: input.text })
    case 'scroll':
      return toBuffer({ type: 'scroll', delta: input.delta })
  }
}
