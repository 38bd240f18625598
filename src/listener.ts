// =============================================================================
// LISTENERS
// =============================================================================

import { EventNotFoundError } from './errors'
import type { EventShadow, Subscriber } from './event-bus'
import type { EditorBus, EditorEventPayload } from './events'
import { mapUserInput } from './input'
import { createLogger, type Logger } from './logger'
import { dispatchEnvelope, type ActionEnvelope } from './reducers'
import type { RadixStore } from './store'

export interface ListenerOptions {
  bus: EditorBus
  store: RadixStore
  topic: string
  id?: string
  logger?: Logger
}

/**
 * A bus subscriber that turns events into reducer calls and writes applied
 * outcomes to the store.
 *
 * Every event is acknowledged once handled, whatever the outcome. An
 * `UnhandledActionError` escapes `process` unacknowledged so the bus reports
 * the crash and supervision takes over.
 */
export abstract class Listener implements Subscriber {
  readonly id: string
  readonly topic: string
  protected readonly bus: EditorBus
  protected readonly store: RadixStore
  protected readonly logger: Logger

  constructor(options: ListenerOptions, defaultId: string) {
    this.id = options.id ?? defaultId
    this.topic = options.topic
    this.bus = options.bus
    this.store = options.store
    this.logger = options.logger ?? createLogger(`Listener:${this.id}`)
  }

  /**
   * Picks the envelope out of a payload; `undefined` marks the event as
   * ignorable.
   */
  protected abstract resolve(payload: EditorEventPayload): ActionEnvelope | undefined

  start(): void {
    this.bus.subscribe(this, [this.topic], { durable: true })
  }

  stop(): void {
    this.bus.unsubscribe(this.id)
  }

  async process(shadow: EventShadow): Promise<void> {
    let payload: EditorEventPayload
    try {
      payload = this.bus.fetch(shadow).payload
    } catch (error) {
      if (!(error instanceof EventNotFoundError)) throw error
      this.logger.warn(`${shadow.topic}#${shadow.id} was reclaimed before it was handled`)
      return
    }

    const envelope = this.resolve(payload)
    if (envelope) {
      await this.dispatch(envelope)
    } else {
      this.logger.debug(`ignoring ${payload.kind} event ${shadow.topic}#${shadow.id}`)
    }

    this.bus.acknowledge(this.id, shadow)
  }

  private async dispatch(envelope: ActionEnvelope): Promise<void> {
    const result = dispatchEnvelope(this.store.get(), envelope, { logger: this.logger })
    if (!result) {
      this.logger.warn(`no reducer for target "${String(envelope.target)}"`)
      return
    }
    if (!result.ok) throw result.error

    const outcome = result.value
    switch (outcome.kind) {
      case 'applied':
        await this.store.put(outcome.state)
        break
      case 'unchanged':
        this.logger.debug(`${envelope.target}/${envelope.action.type}: unchanged`)
        break
      case 'not_applicable':
        this.logger.debug(`${envelope.target}/${envelope.action.type}: not applicable, ${outcome.reason}`)
        break
    }
  }
}

/**
 * Applies action envelopes published on the actions topic.
 */
export class ActionListener extends Listener {
  constructor(options: ListenerOptions) {
    super(options, 'action_listener')
  }

  protected resolve(payload: EditorEventPayload): ActionEnvelope | undefined {
    return payload.kind === 'action' ? payload.envelope : undefined
  }
}

/**
 * Maps raw user input to actions against the snapshot current when the input
 * is handled, then applies them.
 */
export class UserInputListener extends Listener {
  constructor(options: ListenerOptions) {
    super(options, 'user_input_listener')
  }

  protected resolve(payload: EditorEventPayload): ActionEnvelope | undefined {
    return payload.kind === 'user_input' ? mapUserInput(this.store.get(), payload.input) : undefined
  }
}
