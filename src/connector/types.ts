export interface CardAction {
  title: string
  value: string
}

export interface ChoiceCard {
  text: string
  buttons: CardAction[]
}

export type Reply =
  | { kind: 'text'; text: string }
  | { kind: 'card'; card: ChoiceCard }

/** Where a reply goes: enough of the inbound activity to address the conversation. */
export interface ConversationReference {
  conversationId: string
  serviceUrl?: string
  channelId?: string
  botId?: string
  userId?: string
  activityId?: string
}

export interface SendActivityResponse {
  id: string
}

export interface ActivitySender {
  sendActivity(reference: ConversationReference, reply: Reply): Promise<SendActivityResponse>
}

export function toReply(reply: string | Reply): Reply {
  return typeof reply === 'string' ? { kind: 'text', text: reply } : reply
}
