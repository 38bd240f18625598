// =============================================================================
// BUFFER REDUCER
// =============================================================================

import { advanceCursor, clampCursor, moveCursor, type CursorMotion } from '../cursor'
import {
  bufferCursor,
  createBuffer,
  uniqueBufferName,
  untitledBufferName,
  updateBuffer,
  type Buffer,
  type BufferId,
  type BufferMode,
  type BufferUpdate
} from '../buffer'
import { findBuffer, replaceBuffer, type RadixState } from '../radix-state'
import {
  applied,
  createReducer,
  notApplicable,
  unchanged,
  type ReducerContext,
  type ReducerOutcome
} from '../reducer'
import { createScrollHelper } from '../scroll'
import { backspaceAt, splitLines } from '../text-edit'

/** Content and cursor actions address the active buffer unless `buffer` is given. */
export type BufferAction =
  | {
      readonly type: 'open_buffer'
      readonly name?: string
      readonly data?: string
      readonly readOnly?: boolean
      readonly mode?: BufferMode
    }
  | { readonly type: 'close_buffer'; readonly id: BufferId }
  | { readonly type: 'activate'; readonly id: BufferId }
  | { readonly type: 'insert'; readonly text: string; readonly buffer?: BufferId }
  | { readonly type: 'backspace'; readonly buffer?: BufferId }
  | { readonly type: 'set_data'; readonly data: string; readonly buffer?: BufferId }
  | { readonly type: 'insert_line'; readonly after: number; readonly text: string; readonly buffer?: BufferId }
  | { readonly type: 'delete_line'; readonly line: number; readonly buffer?: BufferId }
  | { readonly type: 'move_cursor'; readonly motion: CursorMotion; readonly buffer?: BufferId }
  | { readonly type: 'scroll'; readonly delta: { readonly x: number; readonly y: number } }
  | { readonly type: 'set_read_only'; readonly readOnly: boolean; readonly buffer?: BufferId }
  | { readonly type: 'mark_saved'; readonly buffer?: BufferId }
  | { readonly type: 'set_mode'; readonly mode: BufferMode; readonly buffer?: BufferId }

/**
 * Resolves the addressed buffer and hands it to `fn`; a missing buffer, or
 * no buffers at all, is not applicable.
 */
function withBuffer(
  state: RadixState,
  id: BufferId | undefined,
  fn: (buffer: Buffer) => ReducerOutcome
): ReducerOutcome {
  const target = id ?? state.activeBuf
  if (target === undefined) return notApplicable('no buffer is open')

  const buffer = findBuffer(state, target)
  return buffer ? fn(buffer) : notApplicable(`buffer "${target}" is not open`)
}

function editable(
  state: RadixState,
  id: BufferId | undefined,
  ctx: ReducerContext,
  fn: (buffer: Buffer) => ReducerOutcome
): ReducerOutcome {
  return withBuffer(state, id, buffer => {
    if (buffer.readOnly) {
      ctx.logger.warn(`buffer "${buffer.id}" is read-only`)
      return unchanged()
    }
    return fn(buffer)
  })
}

const put = (state: RadixState, buffer: Buffer): ReducerOutcome =>
  applied(replaceBuffer(state, buffer.id, () => buffer))

/** Applies a content update, then pulls the cursor back inside the new text. */
function rewrite(state: RadixState, buffer: Buffer, update: BufferUpdate): ReducerOutcome {
  const next = updateBuffer(buffer, update)
  const cursor = clampCursor(next.data, bufferCursor(next))
  return put(state, updateBuffer(next, { kind: 'set_cursor', cursor }))
}

const lineCount = (buffer: Buffer) => splitLines(buffer.data ?? '').length

export const bufferReducer = createReducer<BufferAction>('buffer', {
  open_buffer: (state, action) => {
    const id = uniqueBufferName(state.buffers, action.name ?? untitledBufferName(state.buffers))
    const buffer = createBuffer(id, { data: action.data, readOnly: action.readOnly, mode: action.mode })
    return applied({ ...state, buffers: [...state.buffers, buffer], activeBuf: id })
  },

  close_buffer: (state, action) => {
    if (!findBuffer(state, action.id)) return notApplicable(`buffer "${action.id}" is not open`)

    const buffers = state.buffers.filter(buf => buf.id !== action.id)
    return applied({ ...state, buffers, activeBuf: buffers[0]?.id })
  },

  activate: (state, action) => {
    if (!findBuffer(state, action.id)) return notApplicable(`buffer "${action.id}" is not open`)
    if (state.activeBuf === action.id) return unchanged()
    return applied({ ...state, activeBuf: action.id })
  },

  insert: (state, action, ctx) =>
    editable(state, action.buffer, ctx, buffer => {
      if (action.text === '') return unchanged()

      const cursor = bufferCursor(buffer)
      const inserted = updateBuffer(buffer, { kind: 'insert', text: action.text, at: cursor })
      // absent data is replaced wholesale, so typing starts from the origin
      const from = buffer.data === undefined ? { ...cursor, line: 1, col: 1 } : cursor
      const advanced = advanceCursor(from, action.text)
      return put(state, updateBuffer(inserted, { kind: 'set_cursor', cursor: advanced }))
    }),

  backspace: (state, action, ctx) =>
    editable(state, action.buffer, ctx, buffer => {
      if (buffer.data === undefined) return unchanged()

      const result = backspaceAt(buffer.data, bufferCursor(buffer))
      if (!result) return unchanged()

      const next = updateBuffer(buffer, { kind: 'set_data', data: result.text })
      return put(state, updateBuffer(next, { kind: 'set_cursor', cursor: result.cursor }))
    }),

  set_data: (state, action, ctx) =>
    editable(state, action.buffer, ctx, buffer =>
      buffer.data === action.data ? unchanged() : rewrite(state, buffer, { kind: 'set_data', data: action.data })
    ),

  insert_line: (state, action, ctx) =>
    editable(state, action.buffer, ctx, buffer => {
      if (!Number.isInteger(action.after) || action.after < 0 || action.after > lineCount(buffer)) {
        return notApplicable(`cannot insert after line ${action.after}`)
      }
      return rewrite(state, buffer, { kind: 'insert_line', after: action.after, text: action.text })
    }),

  delete_line: (state, action, ctx) =>
    editable(state, action.buffer, ctx, buffer => {
      if (!Number.isInteger(action.line) || action.line < 1 || action.line > lineCount(buffer)) {
        return notApplicable(`cannot delete line ${action.line}`)
      }
      return rewrite(state, buffer, { kind: 'delete_line', line: action.line })
    }),

  move_cursor: (state, action) =>
    withBuffer(state, action.buffer, buffer => {
      const cursor = bufferCursor(buffer)
      const moved = moveCursor(buffer.data, cursor, action.motion)
      if (moved.line === cursor.line && moved.col === cursor.col) return unchanged()
      return put(state, updateBuffer(buffer, { kind: 'set_cursor', cursor: moved }))
    }),

  scroll: (state, action) =>
    withBuffer(state, undefined, buffer => {
      if (!state.scrollState) return notApplicable('no scroll state reported yet')

      const helper = createScrollHelper(state.scrollState, state.config.scrollSpeed)
      const offset = helper.applyScroll(buffer.scrollOffset, action.delta)
      if (offset.x === buffer.scrollOffset.x && offset.y === buffer.scrollOffset.y) return unchanged()
      return put(state, updateBuffer(buffer, { kind: 'set_scroll', offset }))
    }),

  set_read_only: (state, action) =>
    withBuffer(state, action.buffer, buffer =>
      buffer.readOnly === action.readOnly
        ? unchanged()
        : put(state, updateBuffer(buffer, { kind: 'set_read_only', readOnly: action.readOnly }))
    ),

  mark_saved: (state, action) =>
    withBuffer(state, action.buffer, buffer =>
      buffer.dirty ? put(state, updateBuffer(buffer, { kind: 'mark_saved' })) : unchanged()
    ),

  set_mode: (state, action) =>
    withBuffer(state, action.buffer, buffer =>
      buffer.mode === action.mode
        ? unchanged()
        : put(state, updateBuffer(buffer, { kind: 'set_mode', mode: action.mode }))
    )
})
