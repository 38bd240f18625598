// =============================================================================
// ERROR TAXONOMY
// =============================================================================

import type { EventShadow } from './event-bus'

/**
 * Raised by `EventBus.fetch` when the event has already been reclaimed,
 * either because every subscriber acknowledged it or because it timed out.
 */
export class EventNotFoundError extends Error {
  readonly shadow: EventShadow

  constructor(shadow: EventShadow) {
    super(`[EventBus] Event ${shadow.topic}#${shadow.id} not found`)
    this.name = 'EventNotFoundError'
    this.shadow = shadow
  }
}

/**
 * A reducer was handed an action it has no clause for. Reducers return this
 * as the error side of their result; listeners rethrow it so the supervisor
 * can restart them.
 */
export class UnhandledActionError extends Error {
  readonly target: string
  readonly actionType: string

  constructor(target: string, actionType: string) {
    super(`[Reducer] "${target}" has no clause for action "${actionType}"`)
    this.name = 'UnhandledActionError'
    this.target = target
    this.actionType = actionType
  }
}

/**
 * Cursor coordinates fall outside the text they address.
 */
export class CursorRangeError extends RangeError {
  readonly line: number
  readonly col: number

  constructor(line: number, col: number, detail: string) {
    super(`[Buffer] Cursor (${line}, ${col}) out of range: ${detail}`)
    this.name = 'CursorRangeError'
    this.line = line
    this.col = col
  }
}
