import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ConfigError, TransportError } from '../../src/errors.js'
import { createOAuthClient } from '../../src/oauth/client.js'
import { createMockLogger } from '../mocks/connector.js'

describe('OAuthClient', () => {
  const config = { baseUrl: 'https://token.example.com' }
  const mockLogger = createMockLogger()

  beforeEach(() => {
    vi.clearAllMocks()
  })

  function respond(status: number, body: unknown) {
    return vi.fn().mockResolvedValue({
      status,
      ok: status >= 200 && status < 300,
      json: async () => body,
      text: async () => (typeof body === 'string' ? body : JSON.stringify(body))
    })
  }

  describe('construction', () => {
    it('should reject a plain http url', () => {
      expect(() => createOAuthClient({ baseUrl: 'http://token.example.com' }, mockLogger)).toThrow(ConfigError)
    })

    it('should reject something that is not a url', () => {
      expect(() => createOAuthClient({ baseUrl: 'token service' }, mockLogger)).toThrow('Please supply a valid https uri')
    })
  })

  describe('getUserToken', () => {
    it('should return the token for the connection', async () => {
      const mockFetch = respond(200, { connectionName: 'graph', token: 'test-token' })

      const client = createOAuthClient(config, mockLogger, mockFetch)
      const token = await client.getUserToken('user-1', 'graph')

      expect(token).toEqual({ connectionName: 'graph', token: 'test-token' })
      expect(mockFetch).toHaveBeenCalledWith(
        'https://token.example.com/api/usertoken/GetToken?userId=user-1&connectionName=graph',
        { method: 'GET', headers: { 'Accept': 'application/json' } }
      )
    })

    it('should pass the magic code when given', async () => {
      const mockFetch = respond(200, { connectionName: 'graph', token: 'test-token' })

      const client = createOAuthClient(config, mockLogger, mockFetch)
      await client.getUserToken('user-1', 'graph', '123456')

      expect(mockFetch).toHaveBeenCalledWith(
        'https://token.example.com/api/usertoken/GetToken?userId=user-1&connectionName=graph&code=123456',
        expect.any(Object)
      )
    })

    it('should resolve to null when the service has no token', async () => {
      const client = createOAuthClient(config, mockLogger, respond(404, { error: 'not found' }))

      expect(await client.getUserToken('user-1', 'graph')).toBeNull()
    })

    it('should resolve to null when the body is not a token', async () => {
      const client = createOAuthClient(config, mockLogger, respond(200, { unexpected: true }))

      expect(await client.getUserToken('user-1', 'graph')).toBeNull()
      expect(mockLogger.warn).toHaveBeenCalledWith(expect.objectContaining({ event: 'oauth_response_invalid' }))
    })

    it('should require a user id', async () => {
      const client = createOAuthClient(config, mockLogger, respond(200, {}))

      await expect(client.getUserToken('', 'graph')).rejects.toThrow('userId is required')
    })

    it('should send the bearer token when configured', async () => {
      const mockFetch = respond(200, { connectionName: 'graph', token: 'test-token' })

      const client = createOAuthClient({ ...config, accessToken: 'test-secret' }, mockLogger, mockFetch)
      await client.getUserToken('user-1', 'graph')

      expect(mockFetch).toHaveBeenCalledWith(expect.any(String), {
        method: 'GET',
        headers: { 'Accept': 'application/json', 'Authorization': 'Bearer test-secret' }
      })
    })

    it('should throw TransportError on a network error', async () => {
      const mockFetch = vi.fn().mockRejectedValue(new Error('Connection refused'))

      const client = createOAuthClient(config, mockLogger, mockFetch)

      await expect(client.getUserToken('user-1', 'graph')).rejects.toBeInstanceOf(TransportError)
    })
  })

  describe('signOutUser', () => {
    it('should delete the token and report success', async () => {
      const mockFetch = respond(200, {})

      const client = createOAuthClient(config, mockLogger, mockFetch)

      expect(await client.signOutUser('user-1')).toBe(true)
      expect(mockFetch).toHaveBeenCalledWith(
        'https://token.example.com/api/usertoken/SignOut?userId=user-1',
        expect.objectContaining({ method: 'DELETE' })
      )
    })

    it('should report failure on any other status', async () => {
      const client = createOAuthClient(config, mockLogger, respond(500, {}))

      expect(await client.signOutUser('user-1', 'graph')).toBe(false)
    })
  })

  describe('getSignInLink', () => {
    it('should return the link text', async () => {
      const mockFetch = respond(200, 'https://login.example.com/start')

      const client = createOAuthClient(config, mockLogger, mockFetch)

      expect(await client.getSignInLink('test-state')).toBe('https://login.example.com/start')
      expect(mockFetch).toHaveBeenCalledWith(
        'https://token.example.com/api/botsignin/getsigninurl?state=test-state',
        expect.any(Object)
      )
    })

    it('should resolve to null when no link is issued', async () => {
      const client = createOAuthClient(config, mockLogger, respond(400, 'Bad Request'))

      expect(await client.getSignInLink('test-state')).toBeNull()
    })
  })

  describe('getTokenStatus', () => {
    it('should return the status of each connection', async () => {
      const statuses = [{ connectionName: 'graph', hasToken: true, serviceProviderDisplayName: 'Graph' }]
      const mockFetch = respond(200, statuses)

      const client = createOAuthClient(config, mockLogger, mockFetch)

      expect(await client.getTokenStatus('user-1', 'graph')).toEqual(statuses)
      expect(mockFetch).toHaveBeenCalledWith(
        'https://token.example.com/api/usertoken/gettokenstatus?userId=user-1&include=graph',
        expect.any(Object)
      )
    })
  })

  describe('sendEmulateOAuthCards', () => {
    it('should post the emulation flag', async () => {
      const mockFetch = respond(200, {})

      const client = createOAuthClient(config, mockLogger, mockFetch)
      await client.sendEmulateOAuthCards(true)

      expect(mockFetch).toHaveBeenCalledWith(
        'https://token.example.com/api/usertoken/emulateOAuthCards?emulate=true',
        expect.objectContaining({ method: 'POST' })
      )
    })
  })
})
