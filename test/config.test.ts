import { describe, it, expect } from 'vitest'
import { DEFAULT_CONFIG, resolveConfig } from '../src/config'

describe('resolveConfig', () => {
  it('should fall back to defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG)
    expect(DEFAULT_CONFIG).toEqual({
      logLevel: 'warn',
      reclaimAfterMs: undefined,
      restartPolicy: { maxRestarts: 3, withinMs: 5000, backoffMs: 50, backoffFactor: 2 },
      topics: {
        actions: 'editor_actions',
        userInput: 'editor_user_input',
        stateChanged: 'radix_state_change'
      }
    })
  })

  it('should read the environment', () => {
    const config = resolveConfig({}, { RADIX_LOG_LEVEL: 'debug', RADIX_RECLAIM_AFTER_MS: '750' })

    expect(config.logLevel).toBe('debug')
    expect(config.reclaimAfterMs).toBe(750)
  })

  it('should ignore invalid environment values', () => {
    const config = resolveConfig({}, { RADIX_LOG_LEVEL: 'loud', RADIX_RECLAIM_AFTER_MS: 'soon' })

    expect(config.logLevel).toBe('warn')
    expect(config.reclaimAfterMs).toBeUndefined()
    expect(resolveConfig({}, { RADIX_RECLAIM_AFTER_MS: '-5' }).reclaimAfterMs).toBeUndefined()
  })

  it('should let explicit overrides win over the environment', () => {
    const config = resolveConfig(
      { logLevel: 'error', reclaimAfterMs: 100, restartPolicy: { backoffMs: 5 }, topics: { actions: 'acts' } },
      { RADIX_LOG_LEVEL: 'debug', RADIX_RECLAIM_AFTER_MS: '750' }
    )

    expect(config.logLevel).toBe('error')
    expect(config.reclaimAfterMs).toBe(100)
    expect(config.restartPolicy).toEqual({ maxRestarts: 3, withinMs: 5000, backoffMs: 5, backoffFactor: 2 })
    expect(config.topics.actions).toBe('acts')
    expect(config.topics.stateChanged).toBe('radix_state_change')
  })
})
