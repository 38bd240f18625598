/**
 * Scoped console logger.
 *
 * Messages are written through the matching `console` method with a
 * `[scope]` prefix, e.g. `[EventBus] subscriber "view" crashed`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

export interface Logger {
  readonly scope: string
  readonly level: LogLevel
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  /** Derive a logger for a sub-scope, e.g. `EventBus:view`. */
  child(scope: string): Logger
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value)
}

/**
 * Creates a logger that drops messages below `level`.
 *
 * @example
 * ```ts
 * const log = createLogger('Store', 'debug')
 * log.debug('put', { changed: true })
 * ```
 */
export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
  const threshold = LEVEL_ORDER[level]
  const prefix = `[${scope}]`

  const enabled = (at: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[at] >= threshold

  return {
    scope,
    level,
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(prefix, message, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
    child: (sub) => createLogger(`${scope}:${sub}`, level)
  }
}
