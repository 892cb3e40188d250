import type { FastifyInstance } from 'fastify'
import { loadConfig, type Config } from './config.js'
import { APP_NAME, createLogger, resolveLogLevel, type Logger } from './logger.js'
import { loadMessages, type Messages } from './messages.js'
import { createActivityHandler, type ActivityHandler } from './activity/handler.js'
import { createTurnDispatcher, type TurnDispatcher } from './bot/dispatcher.js'
import { DialogIds, registerReminderDialogs } from './bot/reminders.js'
import type { TurnContext } from './bot/turn-context.js'
import { createConnectorSender, createMockSender } from './connector/sender.js'
import type { ActivitySender } from './connector/types.js'
import { createDialogRegistry, type DialogRegistry } from './dialogs/registry.js'
import { createKeywordRecognizer, createLuisRecognizer, type KeywordRule } from './luis/recognizer.js'
import type { IntentRecognizer } from './luis/types.js'
import { createOAuthClient, type OAuthClient } from './oauth/client.js'
import { createInMemoryStateStore } from './state/memory.js'
import type { StateStore } from './state/types.js'
import { createServer } from './server.js'

export interface AppDependencies {
  config: Config
  logger: Logger
  messages: Messages
  store: StateStore
  registry: DialogRegistry<TurnContext>
  recognizer: IntentRecognizer
  sender: ActivitySender
  oauth: OAuthClient
  dispatcher: TurnDispatcher
  activityHandler: ActivityHandler
}

export interface App {
  server: FastifyInstance
  dependencies: AppDependencies
}

const MOCK_KEYWORD_RULES: KeywordRule[] = [
  { intent: DialogIds.CalendarAdd, keywords: ['add', 'create', 'new', 'remind'] },
  { intent: DialogIds.CalendarFind, keywords: ['show', 'find', 'list'] }
]

export function createApp(env: NodeJS.ProcessEnv = process.env): App {
  const logger = createLogger(APP_NAME, resolveLogLevel(env.LOG_LEVEL))
  const config = loadConfig(env, logger)
  const messages = loadMessages(undefined, logger)

  let sender: ActivitySender
  let recognizer: IntentRecognizer
  if (config.mockMode) {
    sender = createMockSender(logger)
    recognizer = createKeywordRecognizer(MOCK_KEYWORD_RULES)
    logger.warn({ event: 'mock_mode_enabled' })
  } else {
    sender = createConnectorSender(config.connector, logger)
    recognizer = createLuisRecognizer(config.luis, logger)
  }

  const oauth = createOAuthClient({ baseUrl: config.oauth.apiUrl, accessToken: config.connector.accessToken }, logger)

  const store = createInMemoryStateStore({ timeoutMs: config.stateTimeoutMs, logger })

  const registry = createDialogRegistry<TurnContext>()
  registerReminderDialogs(registry, messages)

  const dispatcher = createTurnDispatcher({
    store,
    registry,
    recognizer,
    sender,
    messages,
    cancelKeyword: config.cancelKeyword,
    intentThreshold: config.intentThreshold,
    logger
  })

  const activityHandler = createActivityHandler({ dispatcher, logger })

  logger.info({ event: 'dependencies_loaded', messageKeys: Object.keys(messages), dialogs: registry.ids() })

  const server = createServer(config, logger, activityHandler)

  return {
    server,
    dependencies: { config, logger, messages, store, registry, recognizer, sender, oauth, dispatcher, activityHandler }
  }
}
