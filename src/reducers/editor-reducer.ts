import { applied, createReducer, unchanged } from '../reducer'
import type { ScrollSpeed, ScrollState } from '../scroll'
import { isDeepEqual } from '../utils'

/**
 * Editor-wide actions that do not address a buffer.
 */
export type EditorAction =
  | { readonly type: 'set_minor_mode'; readonly mode: 'lateral' | 'none' }
  | { readonly type: 'set_scroll_state'; readonly scrollState: ScrollState }
  | { readonly type: 'set_scroll_speed'; readonly horizontal: number; readonly vertical: number }
  | { readonly type: 'noop' }

export const editorReducer = createReducer<EditorAction>('editor', {
  set_minor_mode: (state, action) => {
    const lateral = action.mode === 'lateral'
    return state.lateral === lateral ? unchanged() : applied({ ...state, lateral })
  },

  set_scroll_state: (state, action) =>
    isDeepEqual(state.scrollState, action.scrollState)
      ? unchanged()
      : applied({ ...state, scrollState: action.scrollState }),

  set_scroll_speed: (state, action) => {
    const scrollSpeed: ScrollSpeed = { horizontal: action.horizontal, vertical: action.vertical }
    return isDeepEqual(state.config.scrollSpeed, scrollSpeed)
      ? unchanged()
      : applied({ ...state, config: { ...state.config, scrollSpeed } })
  },

  noop: () => unchanged()
})
