// =============================================================================
// CONFIGURATION
// =============================================================================

import { isLogLevel, type LogLevel } from './logger'

/**
 * How a supervisor restarts a crashed listener.
 */
export interface RestartPolicy {
  /** Crashes tolerated inside `withinMs` before the listener is given up on. */
  readonly maxRestarts: number
  readonly withinMs: number
  /** Delay before the first restart. */
  readonly backoffMs: number
  /** Multiplier applied to the delay for each further crash in the window. */
  readonly backoffFactor: number
}

export interface EditorTopics {
  readonly actions: string
  readonly userInput: string
  readonly stateChanged: string
}

export interface EditorConfig {
  readonly logLevel: LogLevel
  /** Unacknowledged events are reclaimed after this many ms. Off when undefined. */
  readonly reclaimAfterMs: number | undefined
  readonly restartPolicy: RestartPolicy
  readonly topics: EditorTopics
}

export interface EditorConfigOverrides {
  logLevel?: LogLevel
  reclaimAfterMs?: number
  restartPolicy?: Partial<RestartPolicy>
  topics?: Partial<EditorTopics>
}

export const DEFAULT_TOPICS: EditorTopics = {
  actions: 'editor_actions',
  userInput: 'editor_user_input',
  stateChanged: 'radix_state_change'
}

export const DEFAULT_RESTART_POLICY: RestartPolicy = {
  maxRestarts: 3,
  withinMs: 5000,
  backoffMs: 50,
  backoffFactor: 2
}

export const DEFAULT_CONFIG: EditorConfig = {
  logLevel: 'warn',
  reclaimAfterMs: undefined,
  restartPolicy: DEFAULT_RESTART_POLICY,
  topics: DEFAULT_TOPICS
}

export type ConfigEnv = Readonly<Record<string, string | undefined>>

function fromEnv(env: ConfigEnv): EditorConfigOverrides {
  const overrides: EditorConfigOverrides = {}

  const level = env.RADIX_LOG_LEVEL
  if (isLogLevel(level)) overrides.logLevel = level

  const reclaim = Number(env.RADIX_RECLAIM_AFTER_MS)
  if (env.RADIX_RECLAIM_AFTER_MS !== undefined && Number.isFinite(reclaim) && reclaim > 0) {
    overrides.reclaimAfterMs = reclaim
  }

  return overrides
}

/**
 * Resolves the effective configuration. Precedence, lowest first: defaults,
 * environment (`RADIX_LOG_LEVEL`, `RADIX_RECLAIM_AFTER_MS`), overrides.
 *
 * @example
 * ```ts
 * const config = resolveConfig({ restartPolicy: { maxRestarts: 1 } }, process.env)
 * ```
 */
export function resolveConfig(overrides: EditorConfigOverrides = {}, env: ConfigEnv = {}): EditorConfig {
  const envOverrides = fromEnv(env)

  return {
    logLevel: overrides.logLevel ?? envOverrides.logLevel ?? DEFAULT_CONFIG.logLevel,
    reclaimAfterMs: overrides.reclaimAfterMs ?? envOverrides.reclaimAfterMs ?? DEFAULT_CONFIG.reclaimAfterMs,
    restartPolicy: { ...DEFAULT_RESTART_POLICY, ...overrides.restartPolicy },
    topics: { ...DEFAULT_TOPICS, ...overrides.topics }
  }
}
