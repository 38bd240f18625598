// =============================================================================
// EDITOR ASSEMBLY
// =============================================================================

import { resolveConfig, type ConfigEnv, type EditorConfig, type EditorConfigOverrides } from './config'
import { EventBus, type EventShadow } from './event-bus'
import type { EditorBus, EditorEventPayload } from './events'
import type { UserInput } from './input'
import { ActionListener, UserInputListener, type Listener } from './listener'
import { createLogger } from './logger'
import type { RadixState } from './radix-state'
import type { ActionEnvelope } from './reducers'
import { RadixStore } from './store'
import { ListenerSupervisor } from './supervisor'

export interface EditorOptions extends EditorConfigOverrides {
  initialState?: RadixState
  /** Environment read for configuration, e.g. `process.env`. */
  env?: ConfigEnv
}

export interface Editor {
  readonly bus: EditorBus
  readonly store: RadixStore
  readonly config: EditorConfig
  readonly supervisors: {
    readonly actions: ListenerSupervisor
    readonly userInput: ListenerSupervisor
  }
  /** Publishes an action envelope on the actions topic. */
  action(envelope: ActionEnvelope): EventShadow
  /** Publishes raw input on the user-input topic. */
  userInput(input: UserInput): EventShadow
  /**
   * Calls `callback` with every new snapshot. `id` names the subscription on
   * the bus and must be unique. A callback that throws is logged and the
   * snapshot still counts as delivered. Returns an unsubscribe function.
   */
  onStateChange(id: string, callback: (state: RadixState) => void): () => void
  /** Resolves once every published event has been handled. */
  settle(): Promise<void>
  destroy(): void
}

/**
 * Wires a bus, a store and the two supervised listeners, and starts them.
 * The store exists before any listener so the first snapshot is always
 * readable.
 *
 * @example
 * ```ts
 * const editor = createEditor({ logLevel: 'info' })
 * editor.action({ target: 'buffer', action: { type: 'insert', text: 'hello' } })
 * await editor.settle()
 * editor.store.get().buffers[0]?.data // => 'hello'
 * ```
 */
export function createEditor(options: EditorOptions = {}): Editor {
  const { initialState, env, ...overrides } = options
  const config = resolveConfig(overrides, env)
  const logger = createLogger('Editor', config.logLevel)

  const bus: EditorBus = new EventBus<EditorEventPayload>({
    reclaimAfterMs: config.reclaimAfterMs,
    logger: logger.child('EventBus')
  })
  const store = new RadixStore(bus, {
    initial: initialState,
    topic: config.topics.stateChanged,
    logger: logger.child('Store')
  })

  const observers = logger.child('Observers')

  const supervise = (listener: Listener) =>
    new ListenerSupervisor({
      bus,
      listener,
      policy: config.restartPolicy,
      logger: logger.child(`Supervisor:${listener.id}`)
    })

  const supervisors = {
    actions: supervise(
      new ActionListener({ bus, store, topic: config.topics.actions, logger: logger.child('action_listener') })
    ),
    userInput: supervise(
      new UserInputListener({ bus, store, topic: config.topics.userInput, logger: logger.child('user_input_listener') })
    )
  }
  supervisors.actions.start()
  supervisors.userInput.start()

  return {
    bus,
    store,
    config,
    supervisors,

    action: envelope => bus.publish(config.topics.actions, { kind: 'action', envelope }),

    userInput: input => bus.publish(config.topics.userInput, { kind: 'user_input', input }),

    onStateChange: (id, callback) => {
      bus.subscribe(
        {
          id,
          process: shadow => {
            const { payload } = bus.fetch(shadow)
            try {
              if (payload.kind === 'state_changed') callback(payload.state)
            } catch (error) {
              observers.error(`state observer "${id}" failed on ${shadow.topic}#${shadow.id}`, error)
            }
            bus.acknowledge(id, shadow)
          }
        },
        [config.topics.stateChanged]
      )
      return () => {
        bus.unsubscribe(id)
      }
    },

    settle: () => bus.drain(),

    destroy: () => {
      supervisors.actions.stop()
      supervisors.userInput.stop()
      bus.destroy()
    }
  }
}
