import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from '../core/errors.ts'

export const BASE_SETTINGS_FILE = 'config.json'
export const LOCAL_SETTINGS_FILE = 'config.local.json'
export const ORG_ADMIN_KEY_ENV = 'ORG_ADMIN_API_KEY'
export const TEAM_ADMIN_KEY_ENV = 'TEAM_ADMIN_API_KEY'

const DEFAULT_CONFIG_DIRECTORY = 'config'

// Keys that would hold credentials; these belong in the environment only.
const SECRET_KEYS = ['apiKey', 'orgAdminKey', 'teamAdminKey'] as const

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined))

const fileSettingsSchema = z.object({
  baseUrl: z.string().url(),
  customerCode: z.string().trim().min(1),
  sourceTeamId: z.coerce.number().int().positive(),
  targetTeamId: z.coerce.number().int().positive(),
  testUserEmail: z.string().email(),
  productCode: z.string().trim().min(1).default('II'),
  foreignLicenseId: optionalText,
})

const secretsSchema = z.object({
  [ORG_ADMIN_KEY_ENV]: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  [TEAM_ADMIN_KEY_ENV]: optionalText,
})

export type TSettings = Readonly<{
  baseUrl: string
  customerCode: string
  sourceTeamId: number
  targetTeamId: number
  testUserEmail: string
  /** Product used when a test needs any valid product code */
  productCode: string
  /** A license owned by a team the team-scoped key cannot reach */
  foreignLicenseId: string | undefined
  orgAdminKey: string
  /** Team-scoped key for cross-team negative tests */
  teamAdminKey: string | undefined
}>

export type TLoadSettingsOptions = {
  configDirectory?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Builds the run's settings from `config.json`, overlaid key by key with the optional
 * `config.local.json`, plus secrets from the environment.
 * Throws ConfigurationError listing every missing or malformed key.
 */
export function loadSettings(options: TLoadSettingsOptions = {}): TSettings {
  const configDirectory: string =
    options.configDirectory ?? join(process.cwd(), DEFAULT_CONFIG_DIRECTORY)
  const env: NodeJS.ProcessEnv = options.env ?? process.env

  const base = readSettingsFile(join(configDirectory, BASE_SETTINGS_FILE), true)
  const local = readSettingsFile(join(configDirectory, LOCAL_SETTINGS_FILE), false)
  const merged: Record<string, unknown> = { ...base, ...local }

  const leakedSecrets: string[] = SECRET_KEYS.filter((key) => key in merged)
  if (leakedSecrets.length > 0) {
    throw new ConfigurationError(
      `Secrets must not be stored in settings files (found: ${leakedSecrets.join(', ')}). ` +
        `Set ${ORG_ADMIN_KEY_ENV} / ${TEAM_ADMIN_KEY_ENV} in the environment instead.`,
    )
  }

  const fileResult = fileSettingsSchema.safeParse(merged)
  const secretsResult = secretsSchema.safeParse({
    [ORG_ADMIN_KEY_ENV]: env[ORG_ADMIN_KEY_ENV],
    [TEAM_ADMIN_KEY_ENV]: env[TEAM_ADMIN_KEY_ENV],
  })

  if (!fileResult.success || !secretsResult.success) {
    const problems: string[] = [
      ...(fileResult.success ? [] : describeIssues(fileResult.error)),
      ...(secretsResult.success ? [] : describeIssues(secretsResult.error)),
    ]
    throw new ConfigurationError(
      `Invalid test configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`,
    )
  }

  const fileSettings = fileResult.data
  const secrets = secretsResult.data
  return Object.freeze({
    ...fileSettings,
    foreignLicenseId: fileSettings.foreignLicenseId,
    orgAdminKey: secrets[ORG_ADMIN_KEY_ENV],
    teamAdminKey: secrets[TEAM_ADMIN_KEY_ENV],
  })
}

function readSettingsFile(path: string, required: boolean): Record<string, unknown> {
  if (!existsSync(path)) {
    if (!required) return {}
    throw new ConfigurationError(`${BASE_SETTINGS_FILE} not found at ${path}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    const reason: string = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`${path} is not valid JSON: ${reason}`)
  }

  const objectResult = z.record(z.unknown()).safeParse(parsed)
  if (!objectResult.success) {
    throw new ConfigurationError(`${path} must contain a JSON object`)
  }
  return objectResult.data
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
}
