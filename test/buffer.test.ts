import { describe, it, expect } from 'vitest'
import { createBuffer, uniqueBufferName, untitledBufferName, updateBuffer } from '../src/buffer'
import { CursorRangeError } from '../src/errors'

describe('Buffer', () => {
  describe('createBuffer', () => {
    it('should start with absent data and one cursor at the origin', () => {
      const buf = createBuffer('notes.txt')

      expect(buf.id).toBe('notes.txt')
      expect(buf.name).toBe('notes.txt')
      expect(buf.data).toBeUndefined()
      expect(buf.cursors).toEqual([{ line: 1, col: 1, ordinal: 1 }])
      expect(buf.scrollOffset).toEqual({ x: 0, y: 0 })
      expect(buf.dirty).toBe(false)
      expect(buf.readOnly).toBe(false)
      expect(buf.mode).toBe('edit')
    })

    it('should take a starting mode', () => {
      expect(createBuffer('a', { mode: 'vim_normal' }).mode).toBe('vim_normal')
    })
  })

  describe('updateBuffer', () => {
    it('should set absent data to the inserted text verbatim', () => {
      const buf = updateBuffer(createBuffer('a'), { kind: 'insert', text: 'hello\nworld', at: { line: 7, col: 3 } })
      expect(buf.data).toBe('hello\nworld')
    })

    it('should insert inside the addressed line and record the update', () => {
      const update = { kind: 'insert', text: 'XY', at: { line: 2, col: 2 } } as const
      const buf = updateBuffer(createBuffer('a', { data: 'abc\ndef' }), update)

      expect(buf.data).toBe('abc\ndXYef')
      expect(buf.history).toEqual([update])
      expect(buf.dirty).toBe(true)
    })

    it('should leave other lines untouched', () => {
      const buf = updateBuffer(createBuffer('a', { data: 'one\ntwo\nthree' }), {
        kind: 'insert',
        text: 'X',
        at: { line: 3, col: 1 }
      })
      expect(buf.data).toBe('one\ntwo\nXthree')
    })

    it('should raise a range error for an out-of-range insert', () => {
      const buf = createBuffer('a', { data: 'abc' })
      expect(() => updateBuffer(buf, { kind: 'insert', text: 'x', at: { line: 3, col: 1 } })).toThrow(CursorRangeError)
    })

    it('should change only the scroll offset on set_scroll', () => {
      const buf = createBuffer('a', { data: 'abc' })
      const scrolled = updateBuffer(buf, { kind: 'set_scroll', offset: { x: -5, y: -9 } })

      expect(scrolled).toEqual({ ...buf, scrollOffset: { x: -5, y: -9 } })
      expect(scrolled.cursors).toBe(buf.cursors)
    })

    it('should merge partial cursor coordinates', () => {
      const buf = updateBuffer(createBuffer('a'), { kind: 'set_cursor', cursor: { col: 4 } })
      expect(buf.cursors).toEqual([{ line: 1, col: 4, ordinal: 1 }])
      expect(buf.history).toEqual([])
    })

    it('should apply line edits and clear dirty on mark_saved', () => {
      let buf = createBuffer('a', { data: 'a\nb' })
      buf = updateBuffer(buf, { kind: 'insert_line', after: 1, text: 'mid' })
      buf = updateBuffer(buf, { kind: 'delete_line', line: 3 })

      expect(buf.data).toBe('a\nmid')
      expect(buf.history.map(update => update.kind)).toEqual(['insert_line', 'delete_line'])
      expect(buf.dirty).toBe(true)
      expect(updateBuffer(buf, { kind: 'mark_saved' }).dirty).toBe(false)
    })

    it('should switch mode without touching content or history', () => {
      const buf = createBuffer('a', { data: 'abc' })
      const modal = updateBuffer(buf, { kind: 'set_mode', mode: 'vim_insert' })

      expect(modal).toEqual({ ...buf, mode: 'vim_insert' })
    })

    it('should not mutate the buffer it was given', () => {
      const buf = createBuffer('a', { data: 'abc' })
      updateBuffer(buf, { kind: 'set_data', data: 'xyz' })
      expect(buf.data).toBe('abc')
      expect(buf.history).toEqual([])
    })
  })

  describe('naming', () => {
    it('should name the first untitled buffer untitled*', () => {
      expect(untitledBufferName([])).toBe('untitled*')
    })

    it('should number further untitled buffers from the dirty count', () => {
      const clean = createBuffer('untitled*')
      const dirty = updateBuffer(createBuffer('notes'), { kind: 'set_data', data: 'x' })

      expect(untitledBufferName([clean])).toBe('untitled2*')
      expect(untitledBufferName([clean, dirty])).toBe('untitled3*')
      expect(untitledBufferName([clean, createBuffer('untitled2*')])).toBe('untitled3*')
    })

    it('should suffix taken names', () => {
      const open = [createBuffer('a'), createBuffer('a<2>')]
      expect(uniqueBufferName(open, 'b')).toBe('b')
      expect(uniqueBufferName(open.slice(0, 1), 'a')).toBe('a<2>')
      expect(uniqueBufferName(open, 'a')).toBe('a<3>')
    })
  })
})
