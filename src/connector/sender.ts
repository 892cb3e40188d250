import { z } from 'zod'
import { TransportError } from '../errors.js'
import type { Logger } from '../logger.js'
import type { ActivitySender, ConversationReference, Reply, SendActivityResponse } from './types.js'

export interface ConnectorConfig {
  accessToken?: string
}

const sendResponseSchema = z.object({ id: z.string() })

export function buildOutboundActivity(reference: ConversationReference, reply: Reply): Record<string, unknown> {
  const activity: Record<string, unknown> = {
    type: 'message',
    conversation: { id: reference.conversationId }
  }
  if (reference.botId) activity.from = { id: reference.botId }
  if (reference.userId) activity.recipient = { id: reference.userId }
  if (reference.activityId) activity.replyToId = reference.activityId

  if (reply.kind === 'text') {
    activity.text = reply.text
    return activity
  }

  activity.text = reply.card.text
  activity.suggestedActions = {
    actions: reply.card.buttons.map(button => ({ type: 'imBack', title: button.title, value: button.value }))
  }
  return activity
}

export function createConnectorSender(
  config: ConnectorConfig,
  logger: Logger,
  fetchFunction: typeof fetch = fetch
): ActivitySender {
  async function sendActivity(reference: ConversationReference, reply: Reply): Promise<SendActivityResponse> {
    const conversationId = reference.conversationId
    if (!reference.serviceUrl) {
      logger.error({ event: 'connector_missing_service_url', conversationId })
      throw new TransportError('Cannot reply without a serviceUrl', 'connector')
    }

    const baseUrl = reference.serviceUrl.replace(/\/+$/, '')
    const url = `${baseUrl}/v3/conversations/${encodeURIComponent(conversationId)}/activities`
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (config.accessToken) {
      headers['Authorization'] = `Bearer ${config.accessToken}`
    }

    logger.info({ event: 'connector_send_start', conversationId, kind: reply.kind })

    let response: Response
    try {
      response = await fetchFunction(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(buildOutboundActivity(reference, reply))
      })
    } catch (err) {
      logger.error({ event: 'connector_network_error', conversationId, error: err })
      throw new TransportError('Network error sending activity', 'connector', undefined, { cause: err })
    }

    if (!response.ok) {
      const body = await response.text()
      logger.error({ event: 'connector_api_error', conversationId, statusCode: response.status, body })
      throw new TransportError(`Connector error: ${response.status}`, 'connector', response.status)
    }

    const payload: unknown = await response.json().catch((err: unknown) => {
      logger.warn({ event: 'connector_response_unreadable', conversationId, error: err })
      return null
    })
    const parsed = sendResponseSchema.safeParse(payload)
    const id = parsed.success ? parsed.data.id : ''
    logger.info({ event: 'connector_send_success', conversationId, id })

    return { id }
  }

  return { sendActivity }
}

export function createMockSender(logger: Logger): ActivitySender {
  let messageCounter = 0

  async function sendActivity(reference: ConversationReference, reply: Reply): Promise<SendActivityResponse> {
    messageCounter++
    const id = `mock-activity-${messageCounter}`

    logger.info({
      event: 'mock_send',
      conversationId: reference.conversationId,
      text: reply.kind === 'text' ? reply.text : reply.card.text,
      buttons: reply.kind === 'card' ? reply.card.buttons.map(b => b.title) : undefined,
      id
    })

    return { id }
  }

  return { sendActivity }
}
