// =============================================================================
// EVENT BUS
// =============================================================================

import { EventNotFoundError } from './errors'
import { createLogger, type Logger } from './logger'

/**
 * Identity of an event without its payload.
 */
export interface EventShadow {
  readonly topic: string
  /** Increases by one per publish within the topic, starting at 1. */
  readonly id: number
}

export interface BusEvent<T> extends EventShadow {
  readonly payload: T
  readonly publishedAt: number
}

/**
 * Anything that can be bound to topics. `process` receives shadows one at a
 * time, in publish order; a thrown error or rejected promise terminates the
 * subscriber's delivery and is reported to the crash handlers.
 */
export interface Subscriber {
  readonly id: string
  process(shadow: EventShadow): void | Promise<void>
}

export interface SubscriberCrash {
  readonly subscriberId: string
  /** The event being processed when the subscriber failed. */
  readonly shadow: EventShadow
  readonly error: unknown
}

export type SubscriptionStatus = 'active' | 'terminated'

export interface SubscribeOptions {
  /**
   * Keep the subscription after a crash: it stays `terminated`, keeps its
   * pending acknowledgements and collects new events until it subscribes
   * again. Non-durable subscriptions are removed once the crash handlers ran.
   */
  durable?: boolean
}

export interface EventBusStats {
  readonly storedEvents: number
  readonly subscribers: Record<string, {
    status: SubscriptionStatus
    topics: string[]
    queued: number
  }>
}

export interface EventBusOptions {
  /** Reclaim events still unacknowledged after this many ms. */
  reclaimAfterMs?: number
  logger?: Logger
  now?: () => number
}

interface Subscription {
  subscriber: Subscriber
  topics: Set<string>
  mailbox: EventShadow[]
  status: SubscriptionStatus
  durable: boolean
  running: Promise<void> | undefined
}

interface StoredEvent<T> {
  readonly event: BusEvent<T>
  /** Publish order across all topics. */
  readonly seq: number
  readonly pending: Set<string>
  timer: ReturnType<typeof setTimeout> | undefined
}

/**
 * Topic-addressed publish/subscribe with per-subscriber acknowledgement.
 *
 * Notifications carry only the event shadow; subscribers `fetch` the payload
 * and `acknowledge` when done. An event is dropped once every subscriber
 * bound to its topic at publish time has acknowledged it. Delivery to durable
 * subscriptions is at-least-once: a terminated subscriber that subscribes
 * again is handed every stored event it never acknowledged.
 *
 * @example
 * ```ts
 * const bus = new EventBus<string>()
 * bus.subscribe({
 *   id: 'printer',
 *   process: shadow => {
 *     console.log(bus.fetch(shadow).payload)
 *     bus.acknowledge('printer', shadow)
 *   }
 * }, ['greetings'])
 * bus.publish('greetings', 'hello')
 * ```
 */
export class EventBus<T> {
  private readonly events = new Map<string, Map<number, StoredEvent<T>>>()
  private readonly sequences = new Map<string, number>()
  private readonly subscriptions = new Map<string, Subscription>()
  private readonly crashHandlers = new Set<(crash: SubscriberCrash) => void>()
  private readonly logger: Logger
  private readonly reclaimAfterMs: number | undefined
  private readonly now: () => number
  private publishSeq = 0

  constructor(options: EventBusOptions = {}) {
    this.logger = options.logger ?? createLogger('EventBus')
    this.reclaimAfterMs = options.reclaimAfterMs
    this.now = options.now ?? Date.now
  }

  /**
   * Stores the payload and queues its shadow for every subscriber bound to
   * `topic`. Returns before any subscriber runs.
   */
  publish(topic: string, payload: T): EventShadow {
    const id = (this.sequences.get(topic) ?? 0) + 1
    this.sequences.set(topic, id)
    const shadow: EventShadow = { topic, id }

    const bound = [...this.subscriptions.values()].filter(sub => sub.topics.has(topic))
    if (bound.length === 0) {
      this.logger.debug(`no subscribers for ${topic}#${id}, dropping`)
      return shadow
    }

    const stored: StoredEvent<T> = {
      event: { topic, id, payload, publishedAt: this.now() },
      seq: ++this.publishSeq,
      pending: new Set(bound.map(sub => sub.subscriber.id)),
      timer: undefined
    }
    this.topicEvents(topic).set(id, stored)

    if (this.reclaimAfterMs !== undefined) {
      stored.timer = setTimeout(() => this.reclaim(shadow), this.reclaimAfterMs)
    }

    for (const sub of bound) {
      if (sub.status !== 'active') continue
      sub.mailbox.push(shadow)
      this.schedule(sub)
    }

    return shadow
  }

  /**
   * Binds a subscriber to `topics`. Calling it again for an active subscriber
   * replaces the topic set; calling it for a terminated one reactivates it and
   * redelivers its unacknowledged events in publish order.
   */
  subscribe(subscriber: Subscriber, topics: Iterable<string>, options: SubscribeOptions = {}): void {
    const nextTopics = new Set(topics)
    const durable = options.durable ?? false
    const existing = this.subscriptions.get(subscriber.id)

    if (existing?.status === 'active') {
      for (const topic of existing.topics) {
        if (!nextTopics.has(topic)) this.releaseTopic(subscriber.id, topic)
      }
      existing.subscriber = subscriber
      existing.topics = nextTopics
      existing.durable = durable
      return
    }

    const sub: Subscription = existing ?? {
      subscriber,
      topics: nextTopics,
      mailbox: [],
      status: 'active',
      durable,
      running: undefined
    }
    sub.subscriber = subscriber
    sub.topics = nextTopics
    sub.status = 'active'
    sub.durable = durable
    sub.mailbox = this.unacknowledged(subscriber.id, nextTopics)
    this.subscriptions.set(subscriber.id, sub)

    if (sub.mailbox.length > 0) {
      this.logger.info(`redelivering ${sub.mailbox.length} event(s) to "${subscriber.id}"`)
    }
    this.schedule(sub)
  }

  /**
   * Removes the subscription and gives up its pending acknowledgements.
   */
  unsubscribe(subscriberId: string): boolean {
    const sub = this.subscriptions.get(subscriberId)
    if (!sub) return false

    sub.status = 'terminated'
    sub.mailbox = []
    this.subscriptions.delete(subscriberId)
    for (const topic of sub.topics) this.releaseTopic(subscriberId, topic)
    return true
  }

  /**
   * @throws {EventNotFoundError} when the event has been reclaimed
   */
  fetch(shadow: EventShadow): BusEvent<T> {
    const stored = this.events.get(shadow.topic)?.get(shadow.id)
    if (!stored) throw new EventNotFoundError(shadow)
    return stored.event
  }

  acknowledge(subscriberId: string, shadow: EventShadow): void {
    const stored = this.events.get(shadow.topic)?.get(shadow.id)
    if (!stored) return

    stored.pending.delete(subscriberId)
    if (stored.pending.size === 0) this.remove(shadow)
  }

  onCrash(handler: (crash: SubscriberCrash) => void): () => void {
    this.crashHandlers.add(handler)
    return () => {
      this.crashHandlers.delete(handler)
    }
  }

  subscriptionStatus(subscriberId: string): SubscriptionStatus | undefined {
    return this.subscriptions.get(subscriberId)?.status
  }

  /**
   * Resolves once every mailbox is empty and no subscriber is mid-event.
   */
  async drain(): Promise<void> {
    for (;;) {
      const running = [...this.subscriptions.values()].flatMap(sub => (sub.running ? [sub.running] : []))
      if (running.length === 0) return
      await Promise.all(running)
    }
  }

  stats(): EventBusStats {
    let storedEvents = 0
    for (const byId of this.events.values()) storedEvents += byId.size

    const subscribers: EventBusStats['subscribers'] = {}
    for (const [id, sub] of this.subscriptions) {
      subscribers[id] = { status: sub.status, topics: [...sub.topics], queued: sub.mailbox.length }
    }
    return { storedEvents, subscribers }
  }

  destroy(): void {
    for (const byId of this.events.values()) {
      for (const stored of byId.values()) clearTimeout(stored.timer)
    }
    for (const sub of this.subscriptions.values()) {
      sub.status = 'terminated'
      sub.mailbox = []
    }
    this.events.clear()
    this.subscriptions.clear()
    this.crashHandlers.clear()
  }

  // ---------------------------------------------------------------------------
  // delivery
  // ---------------------------------------------------------------------------

  private schedule(sub: Subscription): void {
    if (sub.running || sub.status !== 'active' || sub.mailbox.length === 0) return

    sub.running = this.run(sub).finally(() => {
      sub.running = undefined
      this.schedule(sub)
    })
  }

  private async run(sub: Subscription): Promise<void> {
    // delivery never starts inside publish()
    await Promise.resolve()

    while (sub.status === 'active') {
      const shadow = sub.mailbox.shift()
      if (!shadow) return

      try {
        await sub.subscriber.process(shadow)
      } catch (error) {
        this.crash(sub, shadow, error)
        return
      }
    }
  }

  private crash(sub: Subscription, shadow: EventShadow, error: unknown): void {
    sub.status = 'terminated'
    sub.mailbox = []

    const subscriberId = sub.subscriber.id
    this.logger.error(`subscriber "${subscriberId}" crashed on ${shadow.topic}#${shadow.id}`, error)

    for (const handler of this.crashHandlers) {
      try {
        handler({ subscriberId, shadow, error })
      } catch (handlerError) {
        this.logger.error('crash handler failed', handlerError)
      }
    }

    // a handler may already have re-subscribed it
    if (!sub.durable && sub.status === 'terminated' && this.subscriptions.get(subscriberId) === sub) {
      this.logger.warn(`removing non-durable subscriber "${subscriberId}" after its crash`)
      this.unsubscribe(subscriberId)
    }
  }

  // ---------------------------------------------------------------------------
  // storage
  // ---------------------------------------------------------------------------

  private topicEvents(topic: string): Map<number, StoredEvent<T>> {
    let byId = this.events.get(topic)
    if (!byId) {
      byId = new Map()
      this.events.set(topic, byId)
    }
    return byId
  }

  private unacknowledged(subscriberId: string, topics: Set<string>): EventShadow[] {
    const owed: StoredEvent<T>[] = []
    for (const topic of topics) {
      for (const stored of this.events.get(topic)?.values() ?? []) {
        if (stored.pending.has(subscriberId)) owed.push(stored)
      }
    }
    return owed
      .sort((a, b) => a.seq - b.seq)
      .map(({ event }) => ({ topic: event.topic, id: event.id }))
  }

  private releaseTopic(subscriberId: string, topic: string): void {
    for (const stored of [...(this.events.get(topic)?.values() ?? [])]) {
      this.acknowledge(subscriberId, stored.event)
    }
  }

  private reclaim(shadow: EventShadow): void {
    const stored = this.events.get(shadow.topic)?.get(shadow.id)
    if (!stored) return

    this.logger.warn(
      `reclaiming ${shadow.topic}#${shadow.id}, never acknowledged by: ${[...stored.pending].join(', ')}`
    )
    this.remove(shadow)
  }

  private remove(shadow: EventShadow): void {
    const byId = this.events.get(shadow.topic)
    const stored = byId?.get(shadow.id)
    if (!byId || !stored) return

    clearTimeout(stored.timer)
    byId.delete(shadow.id)
    if (byId.size === 0) this.events.delete(shadow.topic)
  }
}
