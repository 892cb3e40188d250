import { z } from 'zod'
import type { ConversationReference } from '../connector/types.js'

export const ActivityTypes = {
  Message: 'message',
  ConversationUpdate: 'conversationUpdate'
} as const

export const channelAccountSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional()
})

export const activitySchema = z.object({
  type: z.string().min(1),
  id: z.string().optional(),
  channelId: z.string().optional(),
  serviceUrl: z.string().optional(),
  text: z.string().optional(),
  from: channelAccountSchema,
  recipient: channelAccountSchema,
  conversation: z.object({
    id: z.string().min(1)
  }),
  membersAdded: z.array(channelAccountSchema).optional()
})

export type ChannelAccount = z.infer<typeof channelAccountSchema>
export type Activity = z.infer<typeof activitySchema>

export function toConversationReference(activity: Activity): ConversationReference {
  return {
    conversationId: activity.conversation.id,
    serviceUrl: activity.serviceUrl,
    channelId: activity.channelId,
    botId: activity.recipient.id,
    userId: activity.from.id,
    activityId: activity.id
  }
}
