import { describe, it, expect } from 'vitest'
import { createBuffer } from '../src/buffer'
import {
  activeBuffer,
  createRadixState,
  DEFAULT_BUFFER_NAME,
  radixInvariantViolations,
  replaceBuffer
} from '../src/radix-state'

describe('Radix State', () => {
  it('should start with one active untitled buffer', () => {
    const state = createRadixState()

    expect(state.buffers.map(buf => buf.id)).toEqual([DEFAULT_BUFFER_NAME])
    expect(state.activeBuf).toBe('untitled*')
    expect(activeBuffer(state)?.data).toBeUndefined()
    expect(state.lateral).toBe(false)
    expect(state.scrollState).toBeUndefined()
    expect(radixInvariantViolations(state)).toEqual([])
  })

  it('should replace one buffer and keep the others as they were', () => {
    const a = createBuffer('a')
    const b = createBuffer('b')
    const state = createRadixState({ buffers: [a, b], activeBuf: 'a' })

    const next = replaceBuffer(state, 'a', buf => ({ ...buf, data: 'x' }))

    expect(next.buffers[0]?.data).toBe('x')
    expect(next.buffers[1]).toBe(b)
    expect(state.buffers[0]).toBe(a)
  })

  describe('radixInvariantViolations', () => {
    it('should flag duplicate ids', () => {
      const state = createRadixState({ buffers: [createBuffer('a'), createBuffer('a')], activeBuf: 'a' })
      expect(radixInvariantViolations(state)).toEqual(['buffer ids are not unique'])
    })

    it('should flag an active id that is not open', () => {
      const state = createRadixState({ buffers: [createBuffer('a')], activeBuf: 'b' })
      expect(radixInvariantViolations(state)).toEqual(['activeBuf b is not an open buffer'])
    })

    it('should flag an active id with no buffers open', () => {
      const state = createRadixState({ buffers: [], activeBuf: 'a' })
      expect(radixInvariantViolations(state)).toEqual(['activeBuf a set with no open buffers'])
    })
  })
})
