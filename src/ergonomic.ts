/**
 * Ergonomic Context API (with unctx)
 * ==================================
 *
 * Registers one editor as the ambient instance so setup code can reach the
 * bus and the store without passing the editor around.
 *
 * --- HOW IT WORKS ---
 * 1. `createEditorWithContext` creates the editor and registers it as a
 *    singleton under a namespaced unctx context.
 * 2. `useEditor()`, `useStore()` and `useBus()` read it back from anywhere in
 *    synchronous setup code.
 *
 * --- ASYNC USAGE ---
 * The context is only available synchronously. Inside an async function,
 * read it into a local before the first `await`.
 */

import { getContext } from 'unctx'
import { createEditor, type Editor, type EditorOptions } from './editor'
import type { EditorBus } from './events'
import type { RadixStore } from './store'

const editorContext = getContext<Editor>('radix-editor-context')

/**
 * Creates an editor and makes it the active context. Replaces any editor
 * registered before.
 */
export function createEditorWithContext(options: EditorOptions = {}): Editor {
  const editor = createEditor(options)
  // `true` allows replacing an earlier instance
  editorContext.set(editor, true)
  return editor
}

/**
 * The active editor. Throws when none has been registered.
 */
export function useEditor(): Editor {
  return editorContext.use()
}

export function tryUseEditor(): Editor | null {
  return editorContext.tryUse() ?? null
}

export function useStore(): RadixStore {
  return useEditor().store
}

export function useBus(): EditorBus {
  return useEditor().bus
}

/**
 * Destroys the active editor, if any, and clears the context.
 */
export function releaseEditorContext(): void {
  editorContext.tryUse()?.destroy()
  editorContext.unset()
}
