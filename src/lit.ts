/**
 * lit-html view binding.
 *
 * Renders a template of the current Radix State into a container and renders
 * it again on every state change the store broadcasts.
 */

import { html, render, type TemplateResult } from 'lit-html'
import type { Editor } from './editor'
import { createLogger, type Logger } from './logger'
import type { RadixState } from './radix-state'

export type ViewTemplate = (state: RadixState) => TemplateResult

export interface View {
  readonly container: HTMLElement
  /** Number of renders so far, the initial one included. */
  readonly renders: number
  render(): void
  destroy(): void
}

export interface ViewOptions {
  /** Subscriber id on the bus; defaults to `view:<n>`. */
  id?: string
  logger?: Logger
}

let viewCount = 0

/**
 * Renders `template(store.get())` into `container` now and after every
 * `state_changed` event.
 *
 * @example
 * ```ts
 * const view = createView(editor, document.body, state => html`
 *   <ul>${state.buffers.map(buf => html`<li>${buf.name}</li>`)}</ul>
 * `)
 * ```
 */
export function createView(
  editor: Editor,
  container: HTMLElement,
  template: ViewTemplate,
  options: ViewOptions = {}
): View {
  const id = options.id ?? `view:${++viewCount}`
  const logger = options.logger ?? createLogger('View')
  let renders = 0
  let destroyed = false

  const draw = (state: RadixState) => {
    if (destroyed) return
    try {
      render(template(state), container)
    } catch (error) {
      logger.error(`render of "${id}" failed`, error)
      render(html`<div class="render-error">${String(error)}</div>`, container)
    }
    renders++
  }

  const unsubscribe = editor.onStateChange(id, draw)
  draw(editor.store.get())

  return {
    container,
    get renders() {
      return renders
    },
    render: () => draw(editor.store.get()),
    destroy: () => {
      if (destroyed) return
      destroyed = true
      unsubscribe()
      render(html``, container)
    }
  }
}
