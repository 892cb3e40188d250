import { z } from 'zod'
import { ConfigError, TransportError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'

export interface OAuthClientConfig {
  baseUrl: string
  accessToken?: string
}

export const tokenResponseSchema = z.object({
  channelId: z.string().optional(),
  connectionName: z.string(),
  token: z.string(),
  expiration: z.string().optional()
})

export const tokenStatusSchema = z.object({
  channelId: z.string().optional(),
  connectionName: z.string(),
  hasToken: z.boolean(),
  serviceProviderDisplayName: z.string().optional()
})

export type TokenResponse = z.infer<typeof tokenResponseSchema>
export type TokenStatus = z.infer<typeof tokenStatusSchema>

export interface OAuthClient {
  getUserToken(userId: string, connectionName: string, magicCode?: string): Promise<TokenResponse | null>
  signOutUser(userId: string, connectionName?: string): Promise<boolean>
  getSignInLink(state: string, finalRedirect?: string): Promise<string | null>
  getTokenStatus(userId: string, includeFilter?: string): Promise<TokenStatus[] | null>
  sendEmulateOAuthCards(emulate: boolean): Promise<void>
}

function requireArgument(name: string, value: string | undefined): string {
  if (!value || value.trim().length === 0) {
    throw new TypeError(`${name} is required`)
  }
  return value
}

function parseHttpsUrl(baseUrl: string): URL {
  let url: URL
  try {
    url = new URL(baseUrl)
  } catch {
    throw new ConfigError('Please supply a valid https uri', 'oauth.apiUrl')
  }
  if (url.protocol !== 'https:') {
    throw new ConfigError('Please supply a valid https uri', 'oauth.apiUrl')
  }
  return url
}

/**
 * Client for the channel token service. Lookups that come back with a
 * non-200 status or an unreadable body resolve to null/false; only
 * network failures throw.
 */
export function createOAuthClient(
  config: OAuthClientConfig,
  logger?: Logger,
  fetchFunction: typeof fetch = fetch
): OAuthClient {
  const log = logger ?? createNoopLogger()
  const base = parseHttpsUrl(config.baseUrl)
  const root = base.href.endsWith('/') ? base.href : `${base.href}/`

  function buildUrl(path: string, query: Record<string, string | undefined>): string {
    const url = new URL(path, root)
    for (const [key, value] of Object.entries(query)) {
      if (value) {
        url.searchParams.set(key, value)
      }
    }
    return url.toString()
  }

  async function send(operation: string, method: string, url: string): Promise<Response> {
    const headers: Record<string, string> = { 'Accept': 'application/json' }
    if (config.accessToken) {
      headers['Authorization'] = `Bearer ${config.accessToken}`
    }

    log.info({ event: 'oauth_request_start', operation })
    try {
      const response = await fetchFunction(url, { method, headers })
      log.info({ event: 'oauth_request_complete', operation, statusCode: response.status })
      return response
    } catch (err) {
      log.error({ event: 'oauth_network_error', operation, error: err })
      throw new TransportError(`Network error during ${operation}`, 'oauth', undefined, { cause: err })
    }
  }

  async function readJson<T>(operation: string, response: Response, schema: z.ZodType<T>): Promise<T | null> {
    if (response.status !== 200) {
      return null
    }
    try {
      const parsed = schema.safeParse(await response.json())
      if (parsed.success) {
        return parsed.data
      }
      log.warn({ event: 'oauth_response_invalid', operation, error: parsed.error.message })
    } catch (err) {
      log.warn({ event: 'oauth_json_parse_error', operation, error: err })
    }
    return null
  }

  async function getUserToken(userId: string, connectionName: string, magicCode?: string): Promise<TokenResponse | null> {
    const url = buildUrl('api/usertoken/GetToken', {
      userId: requireArgument('userId', userId),
      connectionName: requireArgument('connectionName', connectionName),
      code: magicCode
    })
    const response = await send('getUserToken', 'GET', url)
    return readJson('getUserToken', response, tokenResponseSchema)
  }

  async function signOutUser(userId: string, connectionName?: string): Promise<boolean> {
    const url = buildUrl('api/usertoken/SignOut', {
      userId: requireArgument('userId', userId),
      connectionName
    })
    const response = await send('signOutUser', 'DELETE', url)
    return response.status === 200
  }

  async function getSignInLink(state: string, finalRedirect?: string): Promise<string | null> {
    const url = buildUrl('api/botsignin/getsigninurl', {
      state: requireArgument('state', state),
      finalRedirect
    })
    const response = await send('getSignInLink', 'GET', url)
    if (response.status !== 200) {
      return null
    }
    return response.text()
  }

  async function getTokenStatus(userId: string, includeFilter?: string): Promise<TokenStatus[] | null> {
    const url = buildUrl('api/usertoken/gettokenstatus', {
      userId: requireArgument('userId', userId),
      include: includeFilter
    })
    const response = await send('getTokenStatus', 'GET', url)
    return readJson('getTokenStatus', response, z.array(tokenStatusSchema))
  }

  async function sendEmulateOAuthCards(emulate: boolean): Promise<void> {
    const url = buildUrl('api/usertoken/emulateOAuthCards', { emulate: String(emulate) })
    await send('sendEmulateOAuthCards', 'POST', url)
  }

  return { getUserToken, signOutUser, getSignInLink, getTokenStatus, sendEmulateOAuthCards }
}
