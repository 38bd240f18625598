import { describe, it, expect, vi } from 'vitest'
import { createLogger, isLogLevel } from '../src/logger'

describe('createLogger', () => {
  it('should prefix messages with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('Store').warn('slow write', { ms: 12 })

    expect(warn).toHaveBeenCalledWith('[Store]', 'slow write', { ms: 12 })
  })

  it('should drop messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const log = createLogger('Bus', 'info')
    log.debug('hidden')
    log.info('shown')

    createLogger('Quiet', 'silent').error('hidden too')

    expect(debug).not.toHaveBeenCalled()
    expect(info).toHaveBeenCalledWith('[Bus]', 'shown')
    expect(error).not.toHaveBeenCalled()
  })

  it('should derive child scopes with the same level', () => {
    const child = createLogger('Editor', 'error').child('Store')

    expect(child.scope).toBe('Editor:Store')
    expect(child.level).toBe('error')
  })

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel(undefined)).toBe(false)
  })
})
