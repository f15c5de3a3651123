import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  createTestClient,
  makeCustomerToken,
  makeTeamToken,
  TEST_SETTINGS,
} from '../../../helpers/index.ts'

describe('TokenApi', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('getToken', () => {
    it('parses a customer-scoped token', async () => {
      const { client, fetch } = createTestClient()
      const token = makeCustomerToken()
      fetch.pushJson(token)

      const response = await client.token.getToken()

      expect(fetch.calls[0].url).toBe(`${TEST_SETTINGS.baseUrl}/token`)
      expect(fetch.calls[0].method).toBe('GET')
      expect(response.statusCode).toBe(200)
      expect(response.body).toEqual(token)
    })

    it('parses a team-scoped token', async () => {
      const { client, fetch } = createTestClient()
      const token = makeTeamToken('VIEWER')
      fetch.pushJson(token)

      const response = await client.token.getToken()

      expect(response.body?.type).toBe('TEAM')
      expect(response.body).toEqual(token)
    })

    it('returns 401 for a rejected key', async () => {
      const { client, fetch } = createTestClient({ apiKey: 'INVALID-KEY-0000000' })
      fetch.push({ status: 401, rawBody: 'Unauthorized' })

      const response = await client.token.getToken()

      expect(fetch.calls[0].headers['X-Api-Key']).toBe('INVALID-KEY-0000000')
      expect(response).toEqual({ statusCode: 401, body: undefined, rawBody: 'Unauthorized' })
    })
  })

  describe('getTokenWithoutAuth', () => {
    it('sends neither auth header', async () => {
      const { client, fetch } = createTestClient()
      fetch.push({ status: 401 })

      const response = await client.token.getTokenWithoutAuth()

      expect(Object.keys(fetch.calls[0].headers)).toEqual(['user-agent'])
      expect(response.statusCode).toBe(401)
    })
  })

  describe('rotateToken', () => {
    it('posts to /token/rotate and keeps the body as parsed JSON', async () => {
      const { client, fetch } = createTestClient()
      fetch.pushJson({ apiKey: 'test-rotated-key' })

      const response = await client.token.rotateToken()

      expect(fetch.calls[0].url).toBe(`${TEST_SETTINGS.baseUrl}/token/rotate`)
      expect(fetch.calls[0].method).toBe('POST')
      expect(response.body).toEqual({ apiKey: 'test-rotated-key' })
    })
  })
})
