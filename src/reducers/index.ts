import type { UnhandledActionError } from '../errors'
import type { RadixState } from '../radix-state'
import type { ReducerContext, ReducerOutcome, Result } from '../reducer'
import { bufferReducer, type BufferAction } from './buffer-reducer'
import { editorReducer, type EditorAction } from './editor-reducer'

export { bufferReducer, editorReducer }
export type { BufferAction, EditorAction }

/**
 * An action addressed to the reducer that owns it.
 */
export type ActionEnvelope =
  | { readonly target: 'buffer'; readonly action: BufferAction }
  | { readonly target: 'editor'; readonly action: EditorAction }

export type ReducerTarget = ActionEnvelope['target']

/**
 * Routes an envelope to its reducer. Returns `undefined` when the target names
 * no reducer, which callers treat as ignorable.
 */
export function dispatchEnvelope(
  state: RadixState,
  envelope: ActionEnvelope,
  ctx?: ReducerContext
): Result<ReducerOutcome, UnhandledActionError> | undefined {
  switch (envelope.target) {
    case 'buffer':
      return bufferReducer.reduce(state, envelope.action, ctx)
    case 'editor':
      return editorReducer.reduce(state, envelope.action, ctx)
    default:
      return undefined
  }
}
