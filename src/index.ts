// Client
export { AccountApiClient, withClient } from './client/account-client.ts'
export type { TAccountApiClientOptions } from './client/account-client.ts'

// Domains (for direct use against a custom Transport)
export { Transport, API_KEY_HEADER, CUSTOMER_CODE_HEADER } from './core/transport.ts'
export type { TTransportOptions, TFetch } from './core/transport.ts'
export { TokenApi } from './domains/token/token.api.ts'
export type { TTokenApi } from './domains/token/token.api.ts'
export { effectiveRole, hasTeamContext, isCustomerScoped } from './domains/token/token.helpers.ts'
export { LicensesApi } from './domains/licenses/licenses.api.ts'
export type { TLicensesApi } from './domains/licenses/licenses.api.ts'
export { AssignLicenseDraft } from './domains/licenses/assign-draft.ts'
export type {
  TAssignLicenseDraftFields,
  TContactDraft,
  TLicenseFromTeamDraft,
} from './domains/licenses/assign-draft.ts'
export { TeamsApi } from './domains/teams/teams.api.ts'
export type { TTeamsApi } from './domains/teams/teams.api.ts'

// Fixtures
export { LicenseFixture } from './fixtures/license-fixture.ts'
export type {
  TAssignableReport,
  TEnsureAssignableOptions,
  TLicenseFixtureOptions,
  TReconcileReport,
  TSkipHook,
} from './fixtures/license-fixture.ts'

// Configuration
export { loadSettings } from './config/settings.ts'
export type { TLoadSettingsOptions, TSettings } from './config/settings.ts'

// Errors
export { ConfigurationError } from './core/errors.ts'

// Types
export type {
  TApiResponse,
  TCredentialOverrides,
  TCredentials,
  THttpMethod,
  TRequestOptions,
} from './core/types.ts'

export type {
  TAssignee,
  TAssigneeType,
  TAssigneeContact,
  TAssignLicenseRequest,
  TAssignmentStatus,
  TChangeTeamRequest,
  TChangeTeamResponse,
  TLicense,
  TLicenseFilter,
  TLicenseFromTeam,
  TToken,
  TTokenScope,
} from './types/api.ts'
