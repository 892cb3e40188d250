import { z } from 'zod'
import { ConfigError, SecretError } from './errors.js'
import { APP_NAME, LOG_LEVELS, createLogger, resolveLogLevel, type Logger } from './logger.js'
import { createLuisService, decryptLuisService, type LuisService } from './luis/service.js'

const coerceBooleanFromEnvVar = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === 'boolean') return val
    return val.toLowerCase() === 'true'
  })
  .default(false)

const configSchema = z
  .object({
    port: z.coerce.number().int().min(1).max(65535).default(3978),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    mockMode: coerceBooleanFromEnvVar,
    cancelKeyword: z.string().trim().toLowerCase().min(1, 'CANCEL_KEYWORD cannot be empty').default('cancel'),
    intentThreshold: z.coerce.number().min(0).max(1).default(0.2),
    stateTimeoutMs: z.coerce.number().int().min(1000).default(24 * 60 * 60 * 1000),
    botFileSecret: z.string().min(1).optional(),
    luis: z.object({
      appId: z.string().default(''),
      authoringKey: z.string().default(''),
      subscriptionKey: z.string().default(''),
      version: z.string().default(''),
      region: z.string().min(1, 'LUIS_REGION cannot be empty').default('westus')
    }),
    connector: z.object({
      accessToken: z.string().min(1).optional()
    }),
    oauth: z.object({
      apiUrl: z.string().url('OAUTH_API_URL must be a valid URL').default('https://api.botframework.com')
    })
  })
  .superRefine((cfg, ctx) => {
    if (cfg.mockMode) return
    if (!cfg.luis.appId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['luis', 'appId'], message: 'LUIS_APP_ID is required unless MOCK_MODE is enabled' })
    }
    if (!cfg.luis.subscriptionKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['luis', 'subscriptionKey'], message: 'LUIS_SUBSCRIPTION_KEY is required unless MOCK_MODE is enabled' })
    }
  })

type ParsedConfig = z.infer<typeof configSchema>

export type Config = Omit<ParsedConfig, 'luis'> & { luis: LuisService }

function fieldToEnvVar(field: string): string {
  const mapping: Record<string, string> = {
    'port': 'PORT',
    'logLevel': 'LOG_LEVEL',
    'mockMode': 'MOCK_MODE',
    'cancelKeyword': 'CANCEL_KEYWORD',
    'intentThreshold': 'LUIS_INTENT_THRESHOLD',
    'stateTimeoutMs': 'STATE_TIMEOUT_MS',
    'botFileSecret': 'BOT_FILE_SECRET',
    'luis.appId': 'LUIS_APP_ID',
    'luis.authoringKey': 'LUIS_AUTHORING_KEY',
    'luis.subscriptionKey': 'LUIS_SUBSCRIPTION_KEY',
    'luis.version': 'LUIS_VERSION',
    'luis.region': 'LUIS_REGION',
    'connector.accessToken': 'MICROSOFT_APP_TOKEN',
    'oauth.apiUrl': 'OAUTH_API_URL'
  }
  return mapping[field] || field.toUpperCase()
}

function resolveLuisService(parsed: ParsedConfig, logger: Logger): LuisService {
  const service = createLuisService({ ...parsed.luis, name: 'reminders' })
  if (!parsed.botFileSecret) {
    return service
  }

  try {
    return decryptLuisService(service, parsed.botFileSecret)
  } catch (err) {
    if (err instanceof SecretError) {
      logger.error({ event: 'luis_keys_decrypt_failed', error: err.message })
      throw new ConfigError(`Failed to decrypt LUIS keys: ${err.message}`, 'botFileSecret')
    }
    throw err
  }
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = createLogger(APP_NAME, resolveLogLevel(env.LOG_LEVEL))
): Config {
  const result = configSchema.safeParse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    mockMode: env.MOCK_MODE,
    cancelKeyword: env.CANCEL_KEYWORD,
    intentThreshold: env.LUIS_INTENT_THRESHOLD,
    stateTimeoutMs: env.STATE_TIMEOUT_MS,
    botFileSecret: env.BOT_FILE_SECRET,
    luis: {
      appId: env.LUIS_APP_ID,
      authoringKey: env.LUIS_AUTHORING_KEY,
      subscriptionKey: env.LUIS_SUBSCRIPTION_KEY,
      version: env.LUIS_VERSION,
      region: env.LUIS_REGION
    },
    connector: {
      accessToken: env.MICROSOFT_APP_TOKEN
    },
    oauth: {
      apiUrl: env.OAUTH_API_URL
    }
  })

  if (!result.success) {
    const missingVars: string[] = []
    const errors = result.error.errors.map(e => {
      const field = e.path.join('.')
      const envVarName = fieldToEnvVar(field)
      if ((e.code === 'invalid_type' && e.received === 'undefined') || e.code === 'custom') {
        missingVars.push(envVarName)
      }
      return { field, envVar: envVarName, message: e.message }
    })

    logger.error({ event: 'config_validation_failed', errors })

    if (missingVars.length > 0) {
      logger.error({
        event: 'missing_environment_variables',
        missing: missingVars,
        hint: 'Add these variables to your environment or .env file'
      })
    }

    const firstError = result.error.errors[0]
    const field = firstError.path.join('.')
    throw new ConfigError(firstError.message, field)
  }

  const config: Config = { ...result.data, luis: resolveLuisService(result.data, logger) }

  logger.info({
    event: 'config_loaded',
    port: config.port,
    logLevel: config.logLevel,
    mockMode: config.mockMode,
    intentThreshold: config.intentThreshold
  })
  return config
}
