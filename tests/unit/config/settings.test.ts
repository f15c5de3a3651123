import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadSettings } from '../../../src/config/settings.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'

const baseSettings = {
  baseUrl: 'https://account.test/api/v1',
  customerCode: 'test-customer-code',
  sourceTeamId: 101,
  targetTeamId: 202,
  testUserEmail: 'qa-automation@example.com',
}

const env = { ORG_ADMIN_API_KEY: 'test-org-admin-key' }

describe('loadSettings', () => {
  let configDirectory: string

  const writeSettings = (fileName: string, content: unknown) => {
    const text = typeof content === 'string' ? content : JSON.stringify(content)
    writeFileSync(join(configDirectory, fileName), text, 'utf8')
  }

  beforeEach(() => {
    configDirectory = mkdtempSync(join(tmpdir(), 'account-api-settings-'))
  })

  afterEach(() => {
    rmSync(configDirectory, { recursive: true, force: true })
  })

  it('loads the base file and secrets from the environment', () => {
    writeSettings('config.json', baseSettings)

    const settings = loadSettings({ configDirectory, env })

    expect(settings).toEqual({
      ...baseSettings,
      productCode: 'II',
      foreignLicenseId: undefined,
      orgAdminKey: 'test-org-admin-key',
      teamAdminKey: undefined,
    })
  })

  it('overlays the local file key by key', () => {
    writeSettings('config.json', baseSettings)
    writeSettings('config.local.json', { customerCode: 'local-customer', targetTeamId: 303 })

    const settings = loadSettings({ configDirectory, env })

    expect(settings.customerCode).toBe('local-customer')
    expect(settings.targetTeamId).toBe(303)
    expect(settings.sourceTeamId).toBe(101)
  })

  it('coerces numeric team ids written as strings', () => {
    writeSettings('config.json', { ...baseSettings, sourceTeamId: '7', targetTeamId: '8' })

    const settings = loadSettings({ configDirectory, env })

    expect(settings.sourceTeamId).toBe(7)
    expect(settings.targetTeamId).toBe(8)
  })

  it('treats blank optional values as absent', () => {
    writeSettings('config.json', { ...baseSettings, foreignLicenseId: '  ' })

    const settings = loadSettings({
      configDirectory,
      env: { ...env, TEAM_ADMIN_API_KEY: '' },
    })

    expect(settings.foreignLicenseId).toBeUndefined()
    expect(settings.teamAdminKey).toBeUndefined()
  })

  it('reads the optional team key and foreign license', () => {
    writeSettings('config.json', { ...baseSettings, foreignLicenseId: 'FOREIGN0001' })

    const settings = loadSettings({
      configDirectory,
      env: { ...env, TEAM_ADMIN_API_KEY: 'test-team-admin-key' },
    })

    expect(settings.foreignLicenseId).toBe('FOREIGN0001')
    expect(settings.teamAdminKey).toBe('test-team-admin-key')
  })

  it('returns a frozen object', () => {
    writeSettings('config.json', baseSettings)

    expect(Object.isFrozen(loadSettings({ configDirectory, env }))).toBe(true)
  })

  it('fails when the base file is missing', () => {
    expect(() => loadSettings({ configDirectory, env })).toThrow(
      `config.json not found at ${join(configDirectory, 'config.json')}`,
    )
  })

  it('fails when the admin key is missing', () => {
    writeSettings('config.json', baseSettings)

    expect(() => loadSettings({ configDirectory, env: {} })).toThrow(
      new ConfigurationError('Invalid test configuration:\n  - ORG_ADMIN_API_KEY: is required'),
    )
  })

  it('fails when the admin key is blank', () => {
    writeSettings('config.json', baseSettings)

    expect(() => loadSettings({ configDirectory, env: { ORG_ADMIN_API_KEY: '   ' } })).toThrow(
      'ORG_ADMIN_API_KEY: is required',
    )
  })

  it('lists every invalid key at once', () => {
    const { customerCode: _omitted, ...withoutCustomer } = baseSettings
    writeSettings('config.json', { ...withoutCustomer, testUserEmail: 'not-an-email' })

    let thrown: unknown
    try {
      loadSettings({ configDirectory, env: {} })
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ConfigurationError)
    expect(thrown instanceof Error ? thrown.message.split('\n') : []).toEqual([
      'Invalid test configuration:',
      '  - customerCode: Required',
      '  - testUserEmail: Invalid email',
      '  - ORG_ADMIN_API_KEY: is required',
    ])
  })

  it('rejects credentials stored in a settings file', () => {
    writeSettings('config.json', baseSettings)
    writeSettings('config.local.json', { apiKey: 'test-secret' })

    expect(() => loadSettings({ configDirectory, env })).toThrow(/found: apiKey/)
  })

  it('rejects a file that is not valid JSON', () => {
    writeSettings('config.json', '{ baseUrl: ')

    expect(() => loadSettings({ configDirectory, env })).toThrow(/config\.json is not valid JSON/)
  })

  it('rejects a file that is not a JSON object', () => {
    writeSettings('config.json', '[1, 2]')

    expect(() => loadSettings({ configDirectory, env })).toThrow(
      `${join(configDirectory, 'config.json')} must contain a JSON object`,
    )
  })
})
