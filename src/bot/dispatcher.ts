import { ActivityTypes, type Activity } from '../activity/types.js'
import type { ActivitySender } from '../connector/types.js'
import { createDialogContext } from '../dialogs/context.js'
import type { DialogRegistry } from '../dialogs/registry.js'
import { dialogStackKey } from '../dialogs/stack.js'
import { createNoopLogger, type Logger } from '../logger.js'
import { getTopScoringIntent, NONE_INTENT, type IntentRecognizer } from '../luis/types.js'
import { getMessage, type Messages } from '../messages.js'
import { createTurnState } from '../state/turn-state.js'
import type { StateStore } from '../state/types.js'
import { createTurnContext, type TurnContext } from './turn-context.js'

export interface TurnDispatcherDeps {
  store: StateStore
  registry: DialogRegistry<TurnContext>
  recognizer: IntentRecognizer
  sender: ActivitySender
  messages: Messages
  cancelKeyword: string
  intentThreshold: number
  logger?: Logger
}

export type TurnAction =
  | 'welcomed'
  | 'cancelled'
  | 'nothing_to_cancel'
  | 'continued'
  | 'dialog_started'
  | 'ignored'

export interface TurnResult {
  handled: boolean
  action: TurnAction
  dialogId?: string
}

export interface TurnDispatcher {
  onTurn(activity: Activity): Promise<TurnResult>
}

export function createTurnDispatcher(deps: TurnDispatcherDeps): TurnDispatcher {
  const { store, registry, recognizer, sender, messages, intentThreshold } = deps
  const cancelKeyword = deps.cancelKeyword.trim().toLowerCase()
  const logger = deps.logger ?? createNoopLogger()

  function isBotAdded(activity: Activity): boolean {
    return (activity.membersAdded ?? []).some(member => member.id === activity.recipient.id)
  }

  async function resolveIntent(turn: TurnContext): Promise<string> {
    const result = await recognizer.recognize(turn.text)
    const top = getTopScoringIntent(result)
    const intent = top.score > intentThreshold ? top.intent : NONE_INTENT

    logger.info({
      event: 'intent_resolved',
      conversationId: turn.activity.conversation.id,
      topIntent: top.intent,
      score: top.score,
      intent
    })
    return intent
  }

  async function onMessage(activity: Activity): Promise<TurnResult> {
    const state = createTurnState(store)
    const turn = createTurnContext({ activity, sender, state, logger })
    const stack = await state.get(turn.conversation, dialogStackKey)
    const dialogs = createDialogContext({ registry, stack, turn, logger })

    let result: TurnResult = { handled: true, action: 'continued' }

    if (turn.text.trim().toLowerCase() === cancelKeyword) {
      if (dialogs.status() !== 'idle') {
        await turn.sendActivity(getMessage(messages, 'cancelled'))
        dialogs.cancelAll()
        result = { handled: true, action: 'cancelled' }
      } else {
        await turn.sendActivity(getMessage(messages, 'nothing_to_cancel'))
        result = { handled: true, action: 'nothing_to_cancel' }
      }
    }

    if (!turn.responded) {
      await dialogs.continue()

      if (!turn.responded) {
        const intent = await resolveIntent(turn)
        await dialogs.begin(intent)
        result = { handled: true, action: 'dialog_started', dialogId: intent }
      }
    }

    state.set(turn.conversation, dialogStackKey, dialogs.stack)
    await state.saveChanges()

    logger.info({
      event: 'turn_completed',
      conversationId: activity.conversation.id,
      action: result.action,
      depth: dialogs.depth()
    })
    return result
  }

  async function onTurn(activity: Activity): Promise<TurnResult> {
    if (activity.type === ActivityTypes.ConversationUpdate && isBotAdded(activity)) {
      const turn = createTurnContext({ activity, sender, state: createTurnState(store), logger })
      await turn.sendActivity(getMessage(messages, 'welcome'))
      return { handled: true, action: 'welcomed' }
    }

    if (activity.type === ActivityTypes.Message) {
      return onMessage(activity)
    }

    logger.info({ event: 'activity_ignored', type: activity.type, conversationId: activity.conversation.id })
    return { handled: false, action: 'ignored' }
  }

  return { onTurn }
}
