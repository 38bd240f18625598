// =============================================================================
// TEXT BUFFER MODEL
// =============================================================================

import { createCursor, updateCursor, type Cursor, type CursorCoords } from './cursor'
import { deleteLine, insertAt, insertLine } from './text-edit'

export type BufferId = string

/** Plain editing, or vim-style modal editing in one of its two modes. */
export type BufferMode = 'edit' | 'vim_normal' | 'vim_insert'

export interface ScrollOffset {
  readonly x: number
  readonly y: number
}

/**
 * An open document. Buffers are values: `updateBuffer` returns a new buffer
 * and never touches the one it was given.
 */
export interface Buffer {
  readonly id: BufferId
  /** Shown in the tab bar. */
  readonly name: string
  /** Absent until the first insert or explicit replacement. */
  readonly data: string | undefined
  /** Exactly one cursor; multi-cursor editing is not supported. */
  readonly cursors: readonly [Cursor]
  /** Content-changing updates, oldest first. */
  readonly history: readonly BufferUpdate[]
  readonly scrollOffset: ScrollOffset
  readonly readOnly: boolean
  /** Changed in memory since it was last saved. */
  readonly dirty: boolean
  readonly mode: BufferMode
}

/**
 * The update contract of a buffer.
 */
export type BufferUpdate =
  | { readonly kind: 'set_scroll'; readonly offset: ScrollOffset }
  | { readonly kind: 'insert'; readonly text: string; readonly at: CursorCoords }
  | { readonly kind: 'set_cursor'; readonly cursor: Partial<CursorCoords> }
  | { readonly kind: 'set_data'; readonly data: string }
  | { readonly kind: 'insert_line'; readonly after: number; readonly text: string }
  | { readonly kind: 'delete_line'; readonly line: number }
  | { readonly kind: 'set_read_only'; readonly readOnly: boolean }
  | { readonly kind: 'mark_saved' }
  | { readonly kind: 'set_mode'; readonly mode: BufferMode }

export interface BufferOptions {
  name?: string
  data?: string
  readOnly?: boolean
  mode?: BufferMode
}

/**
 * Creates a buffer with one cursor at (1, 1). Data stays absent unless given.
 *
 * @example
 * ```ts
 * const buf = createBuffer('notes.txt')
 * buf.data // => undefined
 * buf.cursors[0] // => { line: 1, col: 1, ordinal: 1 }
 * ```
 */
export function createBuffer(id: BufferId, options: BufferOptions = {}): Buffer {
  return {
    id,
    name: options.name ?? id,
    data: options.data,
    cursors: [createCursor(1)],
    history: [],
    scrollOffset: { x: 0, y: 0 },
    readOnly: options.readOnly ?? false,
    dirty: false,
    mode: options.mode ?? 'edit'
  }
}

export function bufferCursor(buffer: Buffer): Cursor {
  return buffer.cursors[0]
}

const withContent = (buffer: Buffer, data: string, update: BufferUpdate): Buffer => ({
  ...buffer,
  data,
  dirty: true,
  history: [...buffer.history, update]
})

/**
 * Applies one update and returns the new buffer.
 *
 * Inserting into a buffer without data sets the data to the inserted text
 * verbatim. Otherwise only the line under `at` is rewritten; an out-of-range
 * `at` throws a `CursorRangeError`.
 *
 * @example
 * ```ts
 * const buf = updateBuffer(createBuffer('a', { data: 'abc\ndef' }), {
 *   kind: 'insert', text: 'XY', at: { line: 2, col: 2 }
 * })
 * buf.data // => 'abc\ndXYef'
 * ```
 */
export function updateBuffer(buffer: Buffer, update: BufferUpdate): Buffer {
  switch (update.kind) {
    case 'set_scroll':
      return { ...buffer, scrollOffset: update.offset }
    case 'insert':
      return withContent(
        buffer,
        buffer.data === undefined ? update.text : insertAt(buffer.data, update.at, update.text),
        update
      )
    case 'set_cursor':
      return { ...buffer, cursors: [updateCursor(buffer.cursors[0], update.cursor)] }
    case 'set_data':
      return withContent(buffer, update.data, update)
    case 'insert_line':
      return withContent(buffer, insertLine(buffer.data ?? '', update.after, update.text), update)
    case 'delete_line':
      return withContent(buffer, deleteLine(buffer.data ?? '', update.line), update)
    case 'set_read_only':
      return { ...buffer, readOnly: update.readOnly }
    case 'mark_saved':
      return { ...buffer, dirty: false }
    case 'set_mode':
      return { ...buffer, mode: update.mode }
  }
}

/**
 * Name for a new untitled buffer: `untitled*` when nothing is open, otherwise
 * `untitled<n>*` where n is the number of dirty buffers plus two, bumped until
 * it is free.
 */
export function untitledBufferName(buffers: readonly Buffer[]): string {
  if (buffers.length === 0) return 'untitled*'

  const taken = new Set(buffers.map(buf => buf.name))
  let n = buffers.filter(buf => buf.dirty).length + 2
  while (taken.has(`untitled${n}*`)) n++
  return `untitled${n}*`
}

/**
 * Makes `name` unique among `buffers` by appending `<2>`, `<3>`, …
 */
export function uniqueBufferName(buffers: readonly Buffer[], name: string): string {
  const taken = new Set(buffers.map(buf => buf.id))
  if (!taken.has(name)) return name

  let n = 2
  while (taken.has(`${name}<${n}>`)) n++
  return `${name}<${n}>`
}
