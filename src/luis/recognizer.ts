import { z } from 'zod'
import { TransportError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import { getLuisEndpoint, type LuisService } from './service.js'
import { rankIntents, type IntentRecognizer, type IntentScore, type RecognizerResult } from './types.js'

const intentScoreSchema = z.object({
  intent: z.string(),
  score: z.number().min(0).max(1)
})

const luisResponseSchema = z.object({
  query: z.string().optional(),
  topScoringIntent: intentScoreSchema.optional(),
  intents: z.array(intentScoreSchema).optional()
})

export function createLuisRecognizer(
  service: LuisService,
  logger?: Logger,
  fetchFunction: typeof fetch = fetch
): IntentRecognizer {
  const log = logger ?? createNoopLogger()

  function buildUrl(text: string): string {
    const params = new URLSearchParams({
      'subscription-key': service.subscriptionKey,
      verbose: 'true',
      timezoneOffset: '0',
      q: text
    })
    return `${getLuisEndpoint(service)}/luis/v2.0/apps/${encodeURIComponent(service.appId)}?${params.toString()}`
  }

  async function recognize(text: string): Promise<RecognizerResult> {
    if (text.trim().length === 0) {
      return { text, intents: [] }
    }

    log.info({ event: 'luis_recognize_start', appId: service.appId })

    let response: Response
    try {
      response = await fetchFunction(buildUrl(text), {
        method: 'GET',
        headers: { 'Accept': 'application/json' }
      })
    } catch (err) {
      log.error({ event: 'luis_network_error', error: err })
      throw new TransportError('Network error calling LUIS', 'recognizer', undefined, { cause: err })
    }

    if (!response.ok) {
      let body: string
      try {
        body = await response.text()
      } catch (err) {
        log.error({ event: 'luis_response_read_error', error: err })
        body = 'Failed to read response body'
      }
      log.error({ event: 'luis_api_error', statusCode: response.status, body })
      throw new TransportError(`LUIS error: ${response.status}`, 'recognizer', response.status)
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (err) {
      log.error({ event: 'luis_json_parse_error', error: err })
      throw new TransportError('Failed to parse LUIS response', 'recognizer', response.status, { cause: err })
    }

    const parsed = luisResponseSchema.safeParse(payload)
    if (!parsed.success) {
      log.error({ event: 'luis_response_invalid', error: parsed.error.message })
      throw new TransportError('Unexpected LUIS response shape', 'recognizer', response.status, { cause: parsed.error })
    }

    // Without verbose results LUIS only reports the top intent.
    const intents = parsed.data.intents ?? (parsed.data.topScoringIntent ? [parsed.data.topScoringIntent] : [])
    const ranked = rankIntents(intents)

    log.info({ event: 'luis_recognize_success', topIntent: ranked[0]?.intent, intentCount: ranked.length })
    return { text, intents: ranked }
  }

  return { recognize }
}

export interface KeywordRule {
  intent: string
  keywords: string[]
  score?: number
}

/** Offline recognizer: scores an intent when any of its keywords appears as a word. */
export function createKeywordRecognizer(rules: KeywordRule[]): IntentRecognizer {
  async function recognize(text: string): Promise<RecognizerResult> {
    const words = new Set(text.toLowerCase().split(/\W+/).filter(Boolean))
    const intents: IntentScore[] = []
    for (const rule of rules) {
      if (rule.keywords.some(keyword => words.has(keyword.toLowerCase()))) {
        intents.push({ intent: rule.intent, score: rule.score ?? 0.9 })
      }
    }
    return { text, intents: rankIntents(intents) }
  }

  return { recognize }
}
