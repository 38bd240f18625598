import type { EventBus } from './event-bus'
import type { UserInput } from './input'
import type { RadixState } from './radix-state'
import type { ActionEnvelope } from './reducers'

/**
 * Everything the editor publishes. Listeners filter on `kind` and treat the
 * rest as ignorable.
 */
export type EditorEventPayload =
  | { readonly kind: 'action'; readonly envelope: ActionEnvelope }
  | { readonly kind: 'user_input'; readonly input: UserInput }
  | { readonly kind: 'state_changed'; readonly state: RadixState }

export type EditorBus = EventBus<EditorEventPayload>
