import { describe, it, expect, vi, beforeEach } from 'vitest'
import { createActivityHandler } from '../../src/activity/handler.js'
import { createKeyedQueue } from '../../src/activity/queue.js'
import type { Activity } from '../../src/activity/types.js'
import type { TurnResult } from '../../src/bot/dispatcher.js'
import { createTurnDispatcher, type TurnDispatcher } from '../../src/bot/dispatcher.js'
import { reminderTitlesKey, registerReminderDialogs } from '../../src/bot/reminders.js'
import type { TurnContext } from '../../src/bot/turn-context.js'
import { createDialogRegistry } from '../../src/dialogs/registry.js'
import { ActivityError } from '../../src/errors.js'
import { createKeywordRecognizer } from '../../src/luis/recognizer.js'
import { createInMemoryStateStore } from '../../src/state/memory.js'
import { createMessageActivity, createMockLogger, createMockSender, testMessages } from '../mocks/connector.js'

describe('ActivityHandler', () => {
  const mockLogger = createMockLogger()

  beforeEach(() => {
    vi.clearAllMocks()
  })

  function createDispatcher() {
    return {
      onTurn: vi.fn(async (_activity: Activity): Promise<TurnResult> => ({ handled: true, action: 'continued' }))
    }
  }

  describe('parsePayload', () => {
    it('should accept a message activity', () => {
      const handler = createActivityHandler({ dispatcher: createDispatcher(), logger: mockLogger })

      const activity = handler.parsePayload(createMessageActivity('hello'))

      expect(activity.text).toBe('hello')
      expect(activity.conversation.id).toBe('conv-1')
    })

    it('should throw ActivityError naming the missing field', () => {
      const handler = createActivityHandler({ dispatcher: createDispatcher(), logger: mockLogger })
      const payload = { type: 'message', text: 'hello', from: { id: 'user-1' }, recipient: { id: 'bot-1' } }

      try {
        handler.parsePayload(payload)
        expect.fail('should have thrown')
      } catch (err) {
        expect(err).toBeInstanceOf(ActivityError)
        if (err instanceof ActivityError) {
          expect(err.field).toBe('conversation')
        }
      }
    })

    it('should reject an empty conversation id', () => {
      const handler = createActivityHandler({ dispatcher: createDispatcher(), logger: mockLogger })
      const payload = createMessageActivity('hello', { conversationId: '' })

      expect(() => handler.parsePayload(payload)).toThrow(ActivityError)
    })

    it('should reject a body that is not an object', () => {
      const handler = createActivityHandler({ dispatcher: createDispatcher(), logger: mockLogger })

      expect(() => handler.parsePayload('hello')).toThrow(ActivityError)
    })
  })

  describe('handle', () => {
    it('should hand the parsed activity to the dispatcher', async () => {
      const dispatcher = createDispatcher()
      const handler = createActivityHandler({ dispatcher, logger: mockLogger })

      const result = await handler.handle(createMessageActivity('hello'))

      expect(result).toEqual({ handled: true, action: 'continued' })
      expect(dispatcher.onTurn).toHaveBeenCalledWith(expect.objectContaining({ text: 'hello' }))
      expect(mockLogger.info).toHaveBeenCalledWith({
        event: 'activity_processed',
        conversationId: 'conv-1',
        action: 'continued'
      })
    })

    it('should not reach the dispatcher with an invalid payload', async () => {
      const dispatcher = createDispatcher()
      const handler = createActivityHandler({ dispatcher, logger: mockLogger })

      await expect(handler.handle({ type: 'message' })).rejects.toBeInstanceOf(ActivityError)
      expect(dispatcher.onTurn).not.toHaveBeenCalled()
    })

    it('should run turns of one conversation one at a time', async () => {
      const started: string[] = []
      let release: () => void = () => {}
      const gate = new Promise<void>(resolve => {
        release = resolve
      })
      const dispatcher = {
        onTurn: vi.fn(async (activity: Activity): Promise<TurnResult> => {
          started.push(activity.text ?? '')
          if (activity.text === 'first') {
            await gate
          }
          return { handled: true, action: 'continued' }
        })
      }
      const handler = createActivityHandler({ dispatcher, logger: mockLogger })

      const first = handler.handle(createMessageActivity('first'))
      const second = handler.handle(createMessageActivity('second'))
      const other = handler.handle(createMessageActivity('other', { conversationId: 'conv-2', userId: 'user-2' }))

      await other
      expect(started).toEqual(['first', 'other'])

      release()
      await Promise.all([first, second])
      expect(started).toEqual(['first', 'other', 'second'])
    })

    it('should run turns of one user one at a time across conversations', async () => {
      const started: string[] = []
      let release: () => void = () => {}
      const gate = new Promise<void>(resolve => {
        release = resolve
      })
      const dispatcher = {
        onTurn: vi.fn(async (activity: Activity): Promise<TurnResult> => {
          started.push(activity.text ?? '')
          if (activity.text === 'group') {
            await gate
          }
          return { handled: true, action: 'continued' }
        })
      }
      const handler = createActivityHandler({ dispatcher, logger: mockLogger })

      const group = handler.handle(createMessageActivity('group', { conversationId: 'group' }))
      const direct = handler.handle(createMessageActivity('direct', { conversationId: 'direct' }))
      const stranger = handler.handle(createMessageActivity('stranger', { conversationId: 'group', userId: 'user-2' }))

      await new Promise(resolve => setTimeout(resolve, 0))
      expect(started).toEqual(['group'])

      release()
      await Promise.all([group, direct, stranger])
      expect([...started].sort()).toEqual(['direct', 'group', 'stranger'])
    })

    it('should keep both reminders when one user saves them in two conversations at once', async () => {
      const store = createInMemoryStateStore({ timeoutMs: 60_000 })
      const registry = createDialogRegistry<TurnContext>()
      registerReminderDialogs(registry, testMessages)
      const dispatcher: TurnDispatcher = createTurnDispatcher({
        store,
        registry,
        recognizer: createKeywordRecognizer([{ intent: 'Calendar_Add', keywords: ['add'] }]),
        sender: createMockSender(),
        messages: testMessages,
        cancelKeyword: 'cancel',
        intentThreshold: 0.2
      })
      const handler = createActivityHandler({ dispatcher, logger: mockLogger })
      const group = { conversationId: 'group', userId: 'user-1' }
      const direct = { conversationId: 'direct', userId: 'user-1' }

      await Promise.all([
        handler.handle(createMessageActivity('add', group)),
        handler.handle(createMessageActivity('add', direct))
      ])
      await Promise.all([
        handler.handle(createMessageActivity('Standup A', group)),
        handler.handle(createMessageActivity('Standup B', direct))
      ])

      expect(await store.get({ scope: 'user', id: 'user-1' }, reminderTitlesKey)).toEqual(['Standup A', 'Standup B'])
    })
  })
})

describe('KeyedQueue', () => {
  it('should keep running tasks for a key after one fails', async () => {
    const queue = createKeyedQueue()

    const failing = queue.run('conv-1', async () => {
      throw new Error('boom')
    })
    const next = queue.run('conv-1', async () => 'next')

    await expect(failing).rejects.toThrow('boom')
    await expect(next).resolves.toBe('next')
  })

  it('should forget a key once its tasks have settled', async () => {
    const queue = createKeyedQueue()

    const task = queue.run('conv-1', async () => 1)
    expect(queue.pending()).toBe(1)

    await task
    await new Promise(resolve => setTimeout(resolve, 0))
    expect(queue.pending()).toBe(0)
  })
})
