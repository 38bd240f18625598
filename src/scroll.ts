// =============================================================================
// SCROLL HELPER
// =============================================================================

import type { ScrollOffset } from './buffer'

export interface Size {
  readonly width: number
  readonly height: number
}

/**
 * Geometry reported by the renderer: the visible frame and the full size of
 * the content drawn inside it.
 */
export interface ScrollState {
  readonly frame: Size
  readonly inner: Size
}

export interface ScrollSpeed {
  readonly horizontal: number
  readonly vertical: number
}

export interface ScrollbarAxis {
  readonly visible: boolean
  readonly thumbLength: number
  readonly thumbOffset: number
}

export interface ScrollbarGeometry {
  readonly horizontal: ScrollbarAxis
  readonly vertical: ScrollbarAxis
}

/**
 * The operations a scrollable component delegates to its helper.
 */
export interface Scrollable {
  applyScroll(offset: ScrollOffset, delta: { x: number; y: number }): ScrollOffset
  scrollbars(offset: ScrollOffset): ScrollbarGeometry
}

/** Slack past the end of the content, in the renderer's units. */
export const SCROLL_MARGIN = 10

export const DEFAULT_SCROLL_SPEED: ScrollSpeed = { horizontal: 5, vertical: 3 }

function capAxis(value: number, frame: number, inner: number): number {
  return Math.min(Math.max(value, -(inner - frame + SCROLL_MARGIN)), 0)
}

function axis(offset: number, frame: number, inner: number): ScrollbarAxis {
  if (inner <= frame) return { visible: false, thumbLength: frame, thumbOffset: 0 }

  const thumbLength = (frame * frame) / inner
  const travel = inner - frame
  const progress = Math.min(Math.max(-offset / travel, 0), 1)
  return { visible: true, thumbLength, thumbOffset: progress * (frame - thumbLength) }
}

/**
 * Creates the scroll helper for one piece of scrollable content.
 *
 * Offsets are translations applied to the content, so they run from 0 down to
 * `-(inner - frame + SCROLL_MARGIN)`. A positive horizontal delta scrolls
 * right and therefore translates left. An axis whose content fits the frame
 * never moves.
 *
 * @example
 * ```ts
 * const scroll = createScrollHelper(
 *   { frame: { width: 100, height: 100 }, inner: { width: 400, height: 50 } },
 *   { horizontal: 5, vertical: 3 }
 * )
 * scroll.applyScroll({ x: 0, y: 0 }, { x: 2, y: 4 }) // => { x: -10, y: 0 }
 * ```
 */
export function createScrollHelper(
  state: ScrollState,
  speed: ScrollSpeed = DEFAULT_SCROLL_SPEED
): Scrollable {
  const { frame, inner } = state

  return {
    applyScroll: (offset, delta) => {
      const dx = inner.width < frame.width ? 0 : -1 * speed.horizontal * delta.x
      const dy = inner.height < frame.height ? 0 : speed.vertical * delta.y

      return {
        x: capAxis(offset.x + dx, frame.width, inner.width),
        y: capAxis(offset.y + dy, frame.height, inner.height)
      }
    },

    scrollbars: offset => ({
      horizontal: axis(offset.x, frame.width, inner.width),
      vertical: axis(offset.y, frame.height, inner.height)
    })
  }
}
