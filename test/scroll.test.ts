import { describe, it, expect } from 'vitest'
import { createScrollHelper, SCROLL_MARGIN } from '../src/scroll'

const wide = { frame: { width: 100, height: 100 }, inner: { width: 400, height: 50 } }
const tall = { frame: { width: 100, height: 100 }, inner: { width: 80, height: 400 } }
const speed = { horizontal: 5, vertical: 3 }

describe('Scroll helper', () => {
  describe('applyScroll', () => {
    it('should negate horizontal deltas and hold an axis whose content fits', () => {
      const scroll = createScrollHelper(wide, speed)
      expect(scroll.applyScroll({ x: 0, y: 0 }, { x: 2, y: 4 })).toEqual({ x: -10, y: 0 })
    })

    it('should cap at the far edge plus the margin', () => {
      const scroll = createScrollHelper(wide, speed)
      expect(scroll.applyScroll({ x: 0, y: 0 }, { x: 100, y: 0 })).toEqual({ x: -(400 - 100 + SCROLL_MARGIN), y: 0 })
    })

    it('should never scroll past the origin', () => {
      const scroll = createScrollHelper(wide, speed)
      expect(scroll.applyScroll({ x: -5, y: 0 }, { x: -2, y: 0 })).toEqual({ x: 0, y: 0 })
    })

    it('should scale vertical deltas by the vertical speed', () => {
      const scroll = createScrollHelper(tall, speed)
      expect(scroll.applyScroll({ x: 0, y: 0 }, { x: 0, y: -5 })).toEqual({ x: 0, y: -15 })
      expect(scroll.applyScroll({ x: 0, y: -300 }, { x: 0, y: -10 })).toEqual({ x: 0, y: -310 })
    })
  })

  describe('scrollbars', () => {
    it('should size and place the thumb from the offset', () => {
      const bars = createScrollHelper(wide, speed).scrollbars({ x: -150, y: 0 })

      expect(bars.horizontal).toEqual({ visible: true, thumbLength: 25, thumbOffset: 37.5 })
      expect(bars.vertical).toEqual({ visible: false, thumbLength: 100, thumbOffset: 0 })
    })
  })
})
