// =============================================================================
// STATE STORE
// =============================================================================

import { DEFAULT_TOPICS } from './config'
import type { EditorBus } from './events'
import { createLogger, type Logger } from './logger'
import { createRadixState, type RadixState } from './radix-state'
import { isDeepEqual } from './utils'

export interface RadixStoreOptions {
  initial?: RadixState
  /** Topic `state_changed` events are published on. */
  topic?: string
  logger?: Logger
}

/**
 * Holds the current Radix State snapshot.
 *
 * Reads and writes are synchronous: a snapshot passed to `put` is what the
 * next `get` returns, so a reader that reduces and writes without yielding
 * never overwrites another writer's change. Every structural change is
 * broadcast with the full new snapshot.
 *
 * @example
 * ```ts
 * const store = new RadixStore(bus)
 * await store.put({ ...store.get(), lateral: true }) // => true
 * store.get().lateral // => true
 * ```
 */
export class RadixStore {
  private state: RadixState
  private readonly topic: string
  private readonly logger: Logger

  constructor(
    private readonly bus: EditorBus,
    options: RadixStoreOptions = {}
  ) {
    this.state = options.initial ?? createRadixState()
    this.topic = options.topic ?? DEFAULT_TOPICS.stateChanged
    this.logger = options.logger ?? createLogger('Store')
  }

  get(): RadixState {
    return this.state
  }

  /**
   * Replaces the snapshot before returning. Resolves with whether the new
   * snapshot differed from the old one.
   */
  put(next: RadixState): Promise<boolean> {
    return Promise.resolve(this.replace(next))
  }

  private replace(next: RadixState): boolean {
    const changed = !isDeepEqual(this.state, next)
    this.state = next

    if (changed) {
      const shadow = this.bus.publish(this.topic, { kind: 'state_changed', state: next })
      this.logger.debug(`state changed, published ${shadow.topic}#${shadow.id}`)
    }
    return changed
  }
}
