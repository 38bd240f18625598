/**
 * radix-editor-core
 * =================
 *
 * State core of a text editor:
 *
 * - one immutable Radix State snapshot held by a store
 * - a topic-based event bus with per-subscriber acknowledgement
 * - supervised listeners that run reducers over incoming actions
 * - a pure text buffer model with a single cursor
 *
 * @example
 * ```ts
 * import { createEditor } from 'radix-editor-core'
 *
 * const editor = createEditor()
 * editor.onStateChange('logger', state => console.log(state.activeBuf))
 * editor.userInput({ type: 'text', text: 'hello' })
 * await editor.settle()
 * ```
 */

// =============================================================================
// CORE
// =============================================================================

export * from './errors'
export * from './logger'
export * from './config'
export * from './utils'

// =============================================================================
// TEXT MODEL
// =============================================================================

export * from './cursor'
export * from './text-edit'
export * from './buffer'
export * from './scroll'
export * from './radix-state'

// =============================================================================
// EVENTS & STATE
// =============================================================================

export * from './event-bus'
export type { EditorBus, EditorEventPayload } from './events'
export * from './store'
export * from './reducer'
export * from './reducers'
export * from './input'
export * from './listener'
export * from './supervisor'

// =============================================================================
// ASSEMBLY & INTEGRATIONS
// =============================================================================

export * from './editor'
export * from './ergonomic'
export * from './lit'
