import { describe, it, expect, vi } from 'vitest'
import { EventBus, type SubscriberCrash } from '../src/event-bus'
import type { EditorEventPayload } from '../src/events'
import { ActionListener, UserInputListener } from '../src/listener'
import { createLogger } from '../src/logger'
import { activeBuffer } from '../src/radix-state'
import type { ActionEnvelope } from '../src/reducers'
import { RadixStore } from '../src/store'

function setup() {
  const bus = new EventBus<EditorEventPayload>({ logger: createLogger('EventBus', 'silent') })
  const store = new RadixStore(bus, { logger: createLogger('Store', 'silent') })
  const logger = createLogger('Listener', 'silent')
  const actions = new ActionListener({ bus, store, topic: 'editor_actions', logger })
  const input = new UserInputListener({ bus, store, topic: 'editor_user_input', logger })
  actions.start()
  input.start()
  return { bus, store, actions, input }
}

describe('Listeners', () => {
  describe('ActionListener', () => {
    it('should apply actions to the store and acknowledge them', async () => {
      const { bus, store } = setup()

      const shadow = bus.publish('editor_actions', {
        kind: 'action',
        envelope: { target: 'buffer', action: { type: 'insert', text: 'hello' } }
      })
      await bus.drain()

      expect(activeBuffer(store.get())?.data).toBe('hello')
      expect(() => bus.fetch(shadow)).toThrow('[EventBus] Event editor_actions#1 not found')
    })

    it('should acknowledge payloads of another kind without touching the store', async () => {
      const { bus, store } = setup()
      const before = store.get()

      const shadow = bus.publish('editor_actions', { kind: 'user_input', input: { type: 'text', text: 'x' } })
      await bus.drain()

      expect(store.get()).toBe(before)
      expect(() => bus.fetch(shadow)).toThrow()
    })

    it('should acknowledge actions that change nothing', async () => {
      const { bus, store } = setup()
      const before = store.get()

      bus.publish('editor_actions', { kind: 'action', envelope: { target: 'editor', action: { type: 'noop' } } })
      bus.publish('editor_actions', {
        kind: 'action',
        envelope: { target: 'buffer', action: { type: 'activate', id: 'ghost' } }
      })
      await bus.drain()

      expect(store.get()).toBe(before)
      expect(bus.stats().storedEvents).toBe(0)
    })

    it('should warn about and acknowledge a target with no reducer', async () => {
      const { bus } = setup()
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const logger = createLogger('Listener', 'warn')
      const listener = new ActionListener({
        bus,
        store: new RadixStore(bus),
        topic: 'other_actions',
        id: 'other_listener',
        logger
      })
      listener.start()

      const envelope: ActionEnvelope = JSON.parse('{"target":"clipboard","action":{"type":"paste"}}')
      bus.publish('other_actions', { kind: 'action', envelope })
      await bus.drain()

      expect(warn).toHaveBeenCalledWith('[Listener]', 'no reducer for target "clipboard"')
      expect(bus.stats().storedEvents).toBe(0)
    })

    it('should crash on an action the reducer has no clause for and leave it unacknowledged', async () => {
      const { bus } = setup()
      const crashes: SubscriberCrash[] = []
      bus.onCrash(crash => crashes.push(crash))

      const envelope: ActionEnvelope = JSON.parse('{"target":"buffer","action":{"type":"teleport"}}')
      const shadow = bus.publish('editor_actions', { kind: 'action', envelope })
      await bus.drain()

      expect(crashes.map(crash => crash.subscriberId)).toEqual(['action_listener'])
      expect(String(crashes[0]?.error)).toBe('UnhandledActionError: [Reducer] "buffer" has no clause for action "teleport"')
      expect(bus.fetch(shadow).payload).toEqual({ kind: 'action', envelope })
      expect(bus.subscriptionStatus('action_listener')).toBe('terminated')
    })

    it('should skip events that were reclaimed before it got to them', async () => {
      const { actions } = setup()
      await expect(actions.process({ topic: 'editor_actions', id: 42 })).resolves.toBeUndefined()
    })
  })

  describe('UserInputListener', () => {
    it('should map input against the current snapshot and apply it', async () => {
      const { bus, store } = setup()

      bus.publish('editor_user_input', { kind: 'user_input', input: { type: 'key', key: 'h', action: 'press' } })
      bus.publish('editor_user_input', { kind: 'user_input', input: { type: 'key', key: 'i', action: 'press' } })
      bus.publish('editor_user_input', { kind: 'user_input', input: { type: 'key', key: 'ArrowLeft', action: 'press' } })
      await bus.drain()

      const buf = activeBuffer(store.get())
      expect(buf?.data).toBe('hi')
      expect(buf?.cursors[0]).toEqual({ line: 1, col: 2, ordinal: 1 })
    })

    it('should enter and leave lateral mode', async () => {
      const { bus, store } = setup()

      bus.publish('editor_user_input', { kind: 'user_input', input: { type: 'key', key: 'ShiftLeft', action: 'press' } })
      await bus.drain()
      expect(store.get().lateral).toBe(true)

      bus.publish('editor_user_input', {
        kind: 'user_input',
        input: { type: 'key', key: 'ShiftLeft', action: 'release' }
      })
      await bus.drain()
      expect(store.get().lateral).toBe(false)
    })

    it('should acknowledge input with no meaning', async () => {
      const { bus, store } = setup()
      const before = store.get()

      bus.publish('editor_user_input', { kind: 'user_input', input: { type: 'key', key: 'F5', action: 'press' } })
      await bus.drain()

      expect(store.get()).toBe(before)
      expect(bus.stats().storedEvents).toBe(0)
    })
  })
})
