/**
 * Line-oriented text primitives.
 *
 * Text is a single string with `\n` separators. Columns count code points,
 * so an emoji occupies one column.
 */

import type { CursorCoords } from './cursor'
import { CursorRangeError } from './errors'

export const NEWLINE = '\n'

export function splitLines(text: string): string[] {
  return text.split(NEWLINE)
}

export function joinLines(lines: readonly string[]): string {
  return lines.join(NEWLINE)
}

export function lineLength(line: string): number {
  return Array.from(line).length
}

/** Splits a line before column `col` (1-based). */
export function splitAtColumn(line: string, col: number): [before: string, after: string] {
  const chars = Array.from(line)
  return [chars.slice(0, col - 1).join(''), chars.slice(col - 1).join('')]
}

function lineAt(lines: readonly string[], at: CursorCoords): string {
  const line = lines[at.line - 1]
  if (!Number.isInteger(at.line) || line === undefined) {
    throw new CursorRangeError(at.line, at.col, `text has ${lines.length} line(s)`)
  }
  const length = lineLength(line)
  if (!Number.isInteger(at.col) || at.col < 1 || at.col > length + 1) {
    throw new CursorRangeError(at.line, at.col, `line ${at.line} has ${length} column(s)`)
  }
  return line
}

/**
 * Inserts `insert` into line `at.line` before column `at.col`. No other line
 * is touched.
 *
 * @example
 * ```ts
 * insertAt('abc\ndef', { line: 2, col: 2 }, 'XY') // => 'abc\ndXYef'
 * ```
 */
export function insertAt(text: string, at: CursorCoords, insert: string): string {
  const lines = splitLines(text)
  const [before, after] = splitAtColumn(lineAt(lines, at), at.col)
  lines[at.line - 1] = before + insert + after
  return joinLines(lines)
}

/**
 * Deletes the character left of `at`. At column 1 the line is joined onto the
 * previous one. Returns `undefined` at the very start of the text.
 */
export function backspaceAt(
  text: string,
  at: CursorCoords
): { text: string; cursor: CursorCoords } | undefined {
  const lines = splitLines(text)
  const current = lineAt(lines, at)

  if (at.col === 1) {
    if (at.line === 1) return undefined
    const previous = lines[at.line - 2] ?? ''
    lines.splice(at.line - 2, 2, previous + current)
    return {
      text: joinLines(lines),
      cursor: { line: at.line - 1, col: lineLength(previous) + 1 }
    }
  }

  const [before, after] = splitAtColumn(current, at.col)
  lines[at.line - 1] = Array.from(before).slice(0, -1).join('') + after
  return { text: joinLines(lines), cursor: { line: at.line, col: at.col - 1 } }
}

/** Inserts `line` after line `after`; `after = 0` puts it first. */
export function insertLine(text: string, after: number, line: string): string {
  const lines = splitLines(text)
  if (!Number.isInteger(after) || after < 0 || after > lines.length) {
    throw new RangeError(`[Buffer] Cannot insert after line ${after}: text has ${lines.length} line(s)`)
  }
  lines.splice(after, 0, line)
  return joinLines(lines)
}

export function deleteLine(text: string, line: number): string {
  const lines = splitLines(text)
  if (!Number.isInteger(line) || line < 1 || line > lines.length) {
    throw new RangeError(`[Buffer] Cannot delete line ${line}: text has ${lines.length} line(s)`)
  }
  lines.splice(line - 1, 1)
  return joinLines(lines)
}
