// =============================================================================
// RADIX STATE
// =============================================================================

import { createBuffer, type Buffer, type BufferId } from './buffer'
import { DEFAULT_SCROLL_SPEED, type ScrollSpeed, type ScrollState } from './scroll'

/**
 * The aggregate application state the renderer observes. Snapshots are never
 * mutated; every change produces a new one.
 */
export interface RadixState {
  readonly buffers: readonly Buffer[]
  /** Set whenever `buffers` is non-empty, and always one of their ids. */
  readonly activeBuf: BufferId | undefined
  /** Lateral minor mode, held while left shift is down. */
  readonly lateral: boolean
  /** Frame and content size of the editor pane, once the renderer reports it. */
  readonly scrollState: ScrollState | undefined
  readonly config: {
    readonly scrollSpeed: ScrollSpeed
  }
}

export const DEFAULT_BUFFER_NAME = 'untitled*'

/**
 * The initial snapshot: one empty untitled buffer, active.
 */
export function createRadixState(overrides: Partial<RadixState> = {}): RadixState {
  const initial = createBuffer(DEFAULT_BUFFER_NAME)

  return {
    buffers: [initial],
    activeBuf: initial.id,
    lateral: false,
    scrollState: undefined,
    config: { scrollSpeed: DEFAULT_SCROLL_SPEED },
    ...overrides
  }
}

export function findBuffer(state: RadixState, id: BufferId): Buffer | undefined {
  return state.buffers.find(buf => buf.id === id)
}

export function activeBuffer(state: RadixState): Buffer | undefined {
  return state.activeBuf === undefined ? undefined : findBuffer(state, state.activeBuf)
}

/**
 * Returns a snapshot with buffer `id` replaced by `fn(buffer)`. Other buffers
 * keep their identity and position.
 */
export function replaceBuffer(
  state: RadixState,
  id: BufferId,
  fn: (buffer: Buffer) => Buffer
): RadixState {
  return {
    ...state,
    buffers: state.buffers.map(buf => (buf.id === id ? fn(buf) : buf))
  }
}

/**
 * Lists every broken invariant of a snapshot; empty when it is sound.
 */
export function radixInvariantViolations(state: RadixState): string[] {
  const violations: string[] = []
  const ids = state.buffers.map(buf => buf.id)

  if (new Set(ids).size !== ids.length) {
    violations.push('buffer ids are not unique')
  }
  if (state.buffers.length > 0 && (state.activeBuf === undefined || !ids.includes(state.activeBuf))) {
    violations.push(`activeBuf ${String(state.activeBuf)} is not an open buffer`)
  }
  if (state.buffers.length === 0 && state.activeBuf !== undefined) {
    violations.push(`activeBuf ${state.activeBuf} set with no open buffers`)
  }

  return violations
}
