import { z } from 'zod'
import type { Transport } from '../../core/transport.ts'
import type { TApiResponse, TCredentialOverrides } from '../../core/types.ts'
import {
  licenseListSchema,
  licenseSchema,
  type TAssignLicenseRequest,
  type TLicense,
  type TLicenseFilter,
} from '../../types/api.ts'
import { AssignLicenseDraft } from './assign-draft.ts'

export type TLicensesApiOptions = {
  transport: Transport
}

/** Thin HTTP client over the license endpoints. No retries, no extra logic. */
export interface TLicensesApi {
  listLicenses(filter?: TLicenseFilter): Promise<TApiResponse<TLicense[]>>
  getLicense(licenseId: string): Promise<TApiResponse<TLicense>>
  getTeamLicenses(teamId: number): Promise<TApiResponse<TLicense[]>>
  assignLicense(request: TAssignLicenseRequest): Promise<TApiResponse<TLicense>>
  assignLicenseRaw(
    body: string | AssignLicenseDraft,
    credentials?: TCredentialOverrides,
  ): Promise<TApiResponse<unknown>>
  revokeLicense(licenseId: string): Promise<TApiResponse<unknown>>
}

export class LicensesApi implements TLicensesApi {
  private transport: Transport

  constructor(options: TLicensesApiOptions) {
    this.transport = options.transport
  }

  public async listLicenses(filter: TLicenseFilter = {}): Promise<TApiResponse<TLicense[]>> {
    return await this.transport.request('GET', '/customer/licenses', {
      queryString: { assignmentStatus: filter.assignmentStatus, teamId: filter.teamId },
      schema: licenseListSchema,
    })
  }

  public async getLicense(licenseId: string): Promise<TApiResponse<TLicense>> {
    return await this.transport.request(
      'GET',
      `/customer/licenses/${encodeURIComponent(licenseId)}`,
      { schema: licenseSchema },
    )
  }

  public async getTeamLicenses(teamId: number): Promise<TApiResponse<TLicense[]>> {
    return await this.transport.request('GET', `/customer/teams/${teamId}/licenses`, {
      schema: licenseListSchema,
    })
  }

  /**
   * A successful assign answers 200 with an empty body, so `body` is usually
   * undefined; callers keep the id they picked for verification and cleanup.
   */
  public async assignLicense(request: TAssignLicenseRequest): Promise<TApiResponse<TLicense>> {
    return await this.transport.request('POST', '/customer/licenses/assign', {
      body: AssignLicenseDraft.from(request).serialize(),
      schema: licenseSchema,
    })
  }

  /** Sends the body as given, bypassing request typing. Any JSON answer is kept as `body`. */
  public async assignLicenseRaw(
    body: string | AssignLicenseDraft,
    credentials?: TCredentialOverrides,
  ): Promise<TApiResponse<unknown>> {
    return await this.transport.request('POST', '/customer/licenses/assign', {
      body: typeof body === 'string' ? body : body.serialize(),
      credentials,
      schema: z.unknown(),
    })
  }

  /**
   * May answer 400 RECENTLY_ASSIGNED_LICENSE_IS_NOT_AVAILABLE_FOR_REVOKE while the
   * license is inside the server's post-assignment cooldown.
   */
  public async revokeLicense(licenseId: string): Promise<TApiResponse<unknown>> {
    return await this.transport.request('POST', '/customer/licenses/revoke', {
      queryString: { licenseId },
      schema: z.unknown(),
    })
  }
}
