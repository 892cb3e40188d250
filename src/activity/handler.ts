import { ActivityError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { TurnDispatcher, TurnResult } from '../bot/dispatcher.js'
import { conversationPrincipal, userPrincipal } from '../bot/turn-context.js'
import { principalKey } from '../state/types.js'
import { createKeyedQueue } from './queue.js'
import { activitySchema, type Activity } from './types.js'

export interface ActivityHandlerDeps {
  dispatcher: TurnDispatcher
  logger?: Logger
}

export function createActivityHandler(deps: ActivityHandlerDeps) {
  const { dispatcher } = deps
  const logger = deps.logger ?? createNoopLogger()
  const queue = createKeyedQueue()

  function parsePayload(body: unknown): Activity {
    const result = activitySchema.safeParse(body)
    if (!result.success) {
      const field = result.error.errors[0]?.path.join('.') ?? 'unknown'
      logger.error({ event: 'activity_parse_error', error: result.error.message, field })
      throw new ActivityError(`Invalid activity payload: ${result.error.message}`, field)
    }
    return result.data
  }

  async function handle(body: unknown): Promise<TurnResult> {
    const activity = parsePayload(body)

    logger.info({
      event: 'activity_received',
      type: activity.type,
      activityId: activity.id,
      conversationId: activity.conversation.id,
      from: activity.from.id
    })

    // A turn writes both the conversation's stack and the user's state.
    // The user key is always taken first, so no two turns wait on each other in a cycle.
    const userKey = principalKey(userPrincipal(activity))
    const conversationKey = principalKey(conversationPrincipal(activity))
    const result = await queue.run(userKey, () => queue.run(conversationKey, () => dispatcher.onTurn(activity)))

    logger.info({ event: 'activity_processed', conversationId: activity.conversation.id, action: result.action })
    return result
  }

  return { handle, parsePayload }
}

export type ActivityHandler = ReturnType<typeof createActivityHandler>
