// =============================================================================
// LISTENER SUPERVISION
// =============================================================================

import {
  action,
  createMachine,
  guard,
  interpret,
  invoke,
  reduce,
  state,
  transition,
  type Service,
  type Transition
} from 'robot3'
import { DEFAULT_RESTART_POLICY, type RestartPolicy } from './config'
import type { SubscriberCrash } from './event-bus'
import type { EditorBus } from './events'
import type { Listener } from './listener'
import { createLogger, type Logger } from './logger'

export type SupervisorStatus = 'idle' | 'running' | 'restarting' | 'stopped' | 'exhausted'

const STATUSES: readonly SupervisorStatus[] = ['idle', 'running', 'restarting', 'stopped', 'exhausted']

const isSupervisorStatus = (value: unknown): value is SupervisorStatus =>
  STATUSES.some(status => status === value)

interface SupervisorContext {
  /** Crash timestamps, oldest first. */
  crashes: number[]
  restarts: number
}

type CrashEvent = {
  type: 'crash'
  at: number
}

export interface SupervisorOptions {
  bus: EditorBus
  listener: Listener
  policy?: Partial<RestartPolicy>
  logger?: Logger
  now?: () => number
}

interface SupervisorHooks {
  /** Crash times still inside the restart window at `at`. */
  recentCrashes(crashes: readonly number[], at: number): number[]
  readonly maxRestarts: number
  /** Resolves after the backoff for the given number of recent crashes. */
  backoff(crashCount: number): Promise<void>
  start(): void
  restart(): void
  giveUp(): void
  stop(): void
}

function createSupervisorMachine(hooks: SupervisorHooks) {
  const recordCrash = reduce<SupervisorContext, CrashEvent>((ctx, ev) => ({
    ...ctx,
    crashes: [...hooks.recentCrashes(ctx.crashes, ev.at), ev.at]
  }))

  const tooManyCrashes = guard<SupervisorContext, CrashEvent>(
    (ctx, ev) => hooks.recentCrashes(ctx.crashes, ev.at).length + 1 > hooks.maxRestarts
  )

  const stop = () => transition('stop', 'stopped', action<SupervisorContext, unknown>(() => hooks.stop()))

  return createMachine(
    'idle',
    {
      idle: state(
        transition('start', 'running', action<SupervisorContext, unknown>(() => hooks.start()))
      ),
      running: state<Transition<'crash' | 'stop'>>(
        transition(
          'crash',
          'exhausted',
          tooManyCrashes,
          recordCrash,
          action<SupervisorContext, CrashEvent>(() => hooks.giveUp())
        ),
        transition('crash', 'restarting', recordCrash),
        stop()
      ),
      restarting: invoke(
        (ctx: SupervisorContext) => hooks.backoff(ctx.crashes.length),
        transition(
          'done',
          'running',
          reduce<SupervisorContext, unknown>(ctx => ({ ...ctx, restarts: ctx.restarts + 1 })),
          action<SupervisorContext, unknown>(() => hooks.restart())
        ),
        stop()
      ),
      stopped: state(),
      exhausted: state()
    },
    (): SupervisorContext => ({ crashes: [], restarts: 0 })
  )
}

type SupervisorMachine = ReturnType<typeof createSupervisorMachine>

/**
 * Keeps one listener subscribed.
 *
 * Lifecycle: `idle → running → restarting → running …`, ending in `stopped`
 * on `stop()` or in `exhausted` once more than `maxRestarts` crashes fall
 * within `withinMs`. On each crash the event being processed is acknowledged
 * on the listener's behalf, so it is dropped rather than retried, and the
 * listener is re-subscribed after `backoffMs * backoffFactor^(n - 1)` ms,
 * n being the number of crashes in the window.
 *
 * @example
 * ```ts
 * const supervisor = new ListenerSupervisor({ bus, listener })
 * supervisor.start()
 * supervisor.status // => 'running'
 * ```
 */
export class ListenerSupervisor {
  readonly listener: Listener
  private readonly bus: EditorBus
  private readonly policy: RestartPolicy
  private readonly logger: Logger
  private readonly now: () => number
  private readonly service: Service<SupervisorMachine>
  private detachCrashHandler: (() => void) | undefined
  private backoffTimer: ReturnType<typeof setTimeout> | undefined

  constructor(options: SupervisorOptions) {
    this.listener = options.listener
    this.bus = options.bus
    this.policy = { ...DEFAULT_RESTART_POLICY, ...options.policy }
    this.logger = options.logger ?? createLogger(`Supervisor:${options.listener.id}`)
    this.now = options.now ?? Date.now
    this.service = interpret(createSupervisorMachine(this.hooks()), service => {
      this.logger.debug(`now ${String(service.machine.current)}`)
    })
  }

  get status(): SupervisorStatus {
    const current: unknown = this.service.machine.current
    return isSupervisorStatus(current) ? current : 'idle'
  }

  get restarts(): number {
    return this.service.context.restarts
  }

  start(): void {
    if (this.status !== 'idle') return
    this.detachCrashHandler = this.bus.onCrash(crash => this.handleCrash(crash))
    this.service.send('start')
  }

  stop(): void {
    this.service.send('stop')
  }

  private handleCrash(crash: SubscriberCrash): void {
    if (crash.subscriberId !== this.listener.id) return

    this.logger.error(`listener crashed on ${crash.shadow.topic}#${crash.shadow.id}`, crash.error)
    this.bus.acknowledge(this.listener.id, crash.shadow)

    const event: CrashEvent = { type: 'crash', at: this.now() }
    this.service.send(event)
  }

  private hooks(): SupervisorHooks {
    const { maxRestarts, withinMs, backoffMs, backoffFactor } = this.policy

    const teardown = () => {
      clearTimeout(this.backoffTimer)
      this.backoffTimer = undefined
      this.detachCrashHandler?.()
      this.detachCrashHandler = undefined
      this.listener.stop()
    }

    return {
      recentCrashes: (crashes, at) => crashes.filter(time => at - time < withinMs),
      maxRestarts,
      backoff: crashCount =>
        new Promise<void>(resolve => {
          const ms = backoffMs * backoffFactor ** (Math.max(crashCount, 1) - 1)
          this.backoffTimer = setTimeout(() => {
            this.backoffTimer = undefined
            resolve()
          }, ms)
        }),
      start: () => this.listener.start(),
      restart: () => {
        this.logger.info('restarting listener')
        this.listener.start()
      },
      giveUp: () => {
        this.logger.error(`giving up after ${maxRestarts} restart(s) within ${withinMs}ms`)
        teardown()
      },
      stop: teardown
    }
  }
}
