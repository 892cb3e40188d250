import { toConversationReference, type Activity } from '../activity/types.js'
import { toReply, type ActivitySender, type Reply } from '../connector/types.js'
import type { DialogTurn } from '../dialogs/types.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { TurnState } from '../state/turn-state.js'
import type { Principal } from '../state/types.js'

export interface TurnContext extends DialogTurn {
  readonly activity: Activity
  readonly state: TurnState
  readonly user: Principal
  readonly conversation: Principal
  /** True once anything has been sent during this turn. */
  readonly responded: boolean
}

export interface TurnContextDeps {
  activity: Activity
  sender: ActivitySender
  state: TurnState
  logger?: Logger
}

function scopedId(activity: Activity, id: string): string {
  return activity.channelId ? `${activity.channelId}/${id}` : id
}

export function userPrincipal(activity: Activity): Principal {
  return { scope: 'user', id: scopedId(activity, activity.from.id) }
}

export function conversationPrincipal(activity: Activity): Principal {
  return { scope: 'conversation', id: scopedId(activity, activity.conversation.id) }
}

export function createTurnContext(deps: TurnContextDeps): TurnContext {
  const { activity, sender, state } = deps
  const logger = deps.logger ?? createNoopLogger()
  const reference = toConversationReference(activity)
  let responded = false

  async function sendActivity(reply: string | Reply): Promise<void> {
    const response = await sender.sendActivity(reference, toReply(reply))
    responded = true
    logger.info({ event: 'reply_sent', conversationId: reference.conversationId, replyId: response.id })
  }

  return {
    activity,
    state,
    user: userPrincipal(activity),
    conversation: conversationPrincipal(activity),
    text: activity.text ?? '',
    get responded() {
      return responded
    },
    sendActivity
  }
}
