/**
 * E2E Tests: GET /token smoke checks
 *
 * Run with:
 *   npm run test:e2e -- tests/integration/e2e/token-smoke.e2e.test.ts
 */

import { describe, expect, it } from 'vitest'
import { effectiveRole, hasTeamContext } from '../../../src/domains/token/token.helpers.ts'
import { describeResponse, setupE2ETest } from './setup.ts'

describe('E2E: GET /token', () => {
  const context = setupE2ETest()

  it('returns 200 with role ADMIN and a team context for the admin key', async (ctx) => {
    const response = await context.client.token.getToken()
    const role = response.body ? effectiveRole(response.body) : undefined
    if (role !== 'ADMIN') {
      ctx.skip(`configured key does not have the ADMIN role (got '${role ?? 'none'}')`)
    }

    expect(response.statusCode, describeResponse(response)).toBe(200)
    expect(role).toBe('ADMIN')
    expect(
      response.body ? hasTeamContext(response.body) : false,
      `expected a team list or a team on the token\n${response.rawBody}`,
    ).toBe(true)
  })

  it('returns 401 without auth headers', async () => {
    const response = await context.client.token.getTokenWithoutAuth()

    expect(response.statusCode, describeResponse(response)).toBe(401)
  })
})
