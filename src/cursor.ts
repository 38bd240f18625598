// =============================================================================
// CURSOR
// =============================================================================

import { lineLength, splitLines } from './text-edit'

/**
 * A position inside a buffer. Both coordinates are 1-based; a cursor sitting
 * after the last character of a 4 character line is in column 5.
 */
export interface Cursor {
  readonly line: number
  readonly col: number
  /** Identifies the cursor among its siblings. */
  readonly ordinal: number
}

export interface CursorCoords {
  readonly line: number
  readonly col: number
}

/**
 * Relative or absolute cursor movement. Every motion is clamped to the text.
 */
export type CursorMotion =
  | { readonly kind: 'delta'; readonly lines: number; readonly columns: number }
  | { readonly kind: 'first_line' }
  | { readonly kind: 'last_line' }
  | { readonly kind: 'to'; readonly line: number; readonly col: number }

export function createCursor(ordinal = 1, coords: Partial<CursorCoords> = {}): Cursor {
  return {
    line: coords.line ?? 1,
    col: coords.col ?? 1,
    ordinal
  }
}

export function updateCursor(cursor: Cursor, coords: Partial<CursorCoords>): Cursor {
  return {
    ...cursor,
    line: coords.line ?? cursor.line,
    col: coords.col ?? cursor.col
  }
}

/**
 * Where the cursor ends up after `text` is typed at it: one column per
 * character, and line + 1 / column 1 for every newline.
 *
 * @example
 * ```ts
 * advanceCursor(createCursor(1, { line: 2, col: 3 }), 'ab\nc')
 * // => { line: 3, col: 2, ordinal: 1 }
 * ```
 */
export function advanceCursor(cursor: Cursor, text: string): Cursor {
  let { line, col } = cursor
  for (const char of text) {
    if (char === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
  return { ...cursor, line, col }
}

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max)

/**
 * Pulls a cursor back inside `text`: line into `[1, lineCount]`, then column
 * into `[1, length(line) + 1]`. Absent text behaves like an empty line.
 */
export function clampCursor(text: string | undefined, cursor: Cursor): Cursor {
  const lines = splitLines(text ?? '')
  const line = clamp(Math.trunc(cursor.line), 1, lines.length)
  const col = clamp(Math.trunc(cursor.col), 1, lineLength(lines[line - 1] ?? '') + 1)
  return line === cursor.line && col === cursor.col ? cursor : { ...cursor, line, col }
}

export function moveCursor(text: string | undefined, cursor: Cursor, motion: CursorMotion): Cursor {
  switch (motion.kind) {
    case 'delta':
      return clampCursor(text, {
        ...cursor,
        line: cursor.line + motion.lines,
        col: cursor.col + motion.columns
      })
    case 'first_line':
      return clampCursor(text, { ...cursor, line: 1 })
    case 'last_line':
      return clampCursor(text, { ...cursor, line: splitLines(text ?? '').length })
    case 'to':
      return clampCursor(text, { ...cursor, line: motion.line, col: motion.col })
  }
}
